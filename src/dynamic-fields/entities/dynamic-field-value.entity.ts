import { Entity, Column, PrimaryGeneratedColumn, Index } from "typeorm";
import { bigintTransformer } from "./numeric.transformer";

/**
 * One row per (field, object). At most one of the value columns is set.
 */
@Entity({ name: "dynamic_field_value" })
@Index(["fieldId", "objectId"])
export class DynamicFieldValue {
  @PrimaryGeneratedColumn("increment", { name: "id" })
  id!: number;

  @Column("integer", { name: "field_id", nullable: false })
  fieldId!: number;

  @Column("bigint", {
    name: "object_id",
    nullable: false,
    transformer: bigintTransformer,
  })
  objectId!: number;

  @Column("text", { name: "value_text", nullable: true })
  valueText!: string | null;

  @Column("timestamp", { name: "value_date", nullable: true })
  valueDate!: Date | null;

  @Column("bigint", {
    name: "value_int",
    nullable: true,
    transformer: bigintTransformer,
  })
  valueInt!: number | null;
}
