import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from "typeorm";
import { FieldType, ObjectType } from "../types/field-types";

@Entity({ name: "dynamic_field" })
export class DynamicField {
  @PrimaryGeneratedColumn("increment", { name: "id" })
  id!: number;

  @Column("smallint", { name: "internal_field", default: 0 })
  internalField!: number;

  @Index({ unique: true })
  @Column("varchar", { length: 200, nullable: false })
  name!: string;

  @Column("varchar", { length: 200, nullable: false })
  label!: string;

  @Column("integer", { name: "field_order", nullable: false })
  fieldOrder!: number;

  @Column("varchar", { name: "field_type", length: 200, nullable: false })
  fieldType!: FieldType;

  @Column("varchar", { name: "object_type", length: 100, nullable: false })
  objectType!: ObjectType;

  // YAML-encoded, type-specific configuration
  @Column("bytea", { nullable: true })
  config!: Buffer | null;

  @Column("smallint", { name: "valid_id", nullable: false })
  validId!: number;

  @CreateDateColumn({ name: "create_time", type: "timestamp" })
  createTime!: Date;

  @Column("integer", { name: "create_by", nullable: false })
  createBy!: number;

  @UpdateDateColumn({ name: "change_time", type: "timestamp" })
  changeTime!: Date;

  @Column("integer", { name: "change_by", nullable: false })
  changeBy!: number;
}
