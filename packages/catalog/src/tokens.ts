import { createToken } from "@vitrine/core";
import type { Connection } from "@vitrine/orm";
import type { AppConfig } from "./config/app-config";

export const APP_CONFIG = createToken<AppConfig>("VITRINE_APP_CONFIG");
export const DB_CONNECTION = createToken<Connection>("VITRINE_DB_CONNECTION");

/** Response cache ttls of the list routes, in milliseconds. */
export const CATEGORY_LIST_TTL = createToken<number>("VITRINE_CATEGORY_LIST_TTL");
export const TYPE_LIST_TTL = createToken<number>("VITRINE_TYPE_LIST_TTL");
