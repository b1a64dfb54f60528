import { Column, Entity, ManyToOne, OneToMany, PrimaryGeneratedColumn } from "@vitrine/orm";

const now = () => new Date().toISOString();

@Entity({ table: "categories" })
export class Category {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ length: 155 })
  title!: string;

  /** Image store reference, e.g. `category/<id>.png`. */
  @Column({ nullable: true })
  image!: string | null;

  @Column({ type: "date", default: now, updatable: false })
  createdAt!: string;
}

@Entity({ table: "types" })
export class ProductType {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ length: 155 })
  title!: string;

  @Column({ type: "text" })
  description!: string;

  @ManyToOne(() => Category, { onDelete: "cascade" })
  category?: Category | null;

  categoryId!: number;

  @Column({ type: "date", default: now, updatable: false })
  createdAt!: string;
}

@Entity({ table: "products" })
export class Product {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "uuid", generated: "uuid", unique: true, updatable: false })
  uuid!: string;

  @Column({ length: 155 })
  title!: string;

  @Column({ type: "text" })
  description!: string;

  @ManyToOne(() => Category, { onDelete: "cascade" })
  category?: Category | null;

  categoryId!: number;

  @ManyToOne(() => ProductType, { onDelete: "cascade" })
  typesProduct?: ProductType | null;

  typesProductId!: number;

  /** Kept as submitted; validated as a positive decimal. */
  @Column({ type: "decimal", length: 30 })
  price!: string;

  @Column({ type: "boolean", default: false })
  isActive!: boolean;

  @Column({ type: "date", default: now, updatable: false })
  createdAt!: string;

  @OneToMany(() => ProductImage, "product")
  images?: ProductImage[];
}

@Entity({ table: "product_images" })
export class ProductImage {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  image!: string;

  @ManyToOne(() => Product, { onDelete: "cascade" })
  product?: Product | null;

  productId!: number;
}

export const CATALOG_ENTITIES = [Category, ProductType, Product, ProductImage];
