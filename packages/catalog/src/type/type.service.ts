import { Inject, Injectable, evaluateRules } from "@vitrine/core";
import { LOGGER, type StructuredLogger } from "@vitrine/observability";
import type { Connection } from "@vitrine/orm";
import { Category, ProductType } from "../entities";
import { CatalogValidationError } from "../errors";
import { type TypeRepresentation, serializeType } from "../serializers";
import { DB_CONNECTION } from "../tokens";
import { createTypeRules } from "./dto/create-type.dto";

@Injectable()
export class TypeService {
  private readonly logger: StructuredLogger;

  constructor(
    @Inject(DB_CONNECTION) private readonly connection: Connection,
    @Inject(LOGGER) logger: StructuredLogger,
  ) {
    this.logger = logger.child({ component: "type" });
  }

  async list(): Promise<TypeRepresentation[]> {
    const repository = this.connection.getRepository(ProductType);
    const types = await repository.prefetch(await repository.find(), ["category"]);
    return types.map(serializeType);
  }

  async create(input: Record<string, unknown>): Promise<TypeRepresentation> {
    const categories = this.connection.getRepository(Category);
    const outcome = await evaluateRules(
      createTypeRules({ categoryExists: (id) => categories.exists({ id }) }),
      input,
    );
    if (!outcome.success) {
      throw new CatalogValidationError(outcome.errors);
    }
    const { title, description, category } = outcome.data;
    const repository = this.connection.getRepository(ProductType);
    const created = await repository.save(repository.create({ title, description, categoryId: category }));
    await repository.prefetch([created], ["category"]);
    this.logger.info("Type created", { id: created.id, category });
    return serializeType(created);
  }
}
