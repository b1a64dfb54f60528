#!/usr/bin/env node
import kleur from "kleur";
import { CliError, createProgram } from "./program";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(kleur.red(error instanceof Error ? error.message : String(error)));
    if (error instanceof CliError) {
      error.details.forEach((line) => console.error(kleur.red(`  ${line}`)));
    }
    process.exit(1);
  });
