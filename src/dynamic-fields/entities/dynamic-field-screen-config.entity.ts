import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Unique,
} from "typeorm";
import { ScreenLevel } from "../types/field-types";

@Entity({ name: "dynamic_field_screen_config" })
@Unique(["fieldId", "screenKey"])
export class DynamicFieldScreenConfig {
  @PrimaryGeneratedColumn("increment", { name: "id" })
  id!: number;

  @Column("integer", { name: "field_id", nullable: false })
  fieldId!: number;

  @Column("varchar", { name: "screen_key", length: 200, nullable: false })
  screenKey!: string;

  @Column("smallint", { name: "config_value", nullable: false })
  configValue!: ScreenLevel;

  @CreateDateColumn({ name: "create_time", type: "timestamp" })
  createTime!: Date;

  @Column("integer", { name: "create_by", nullable: false })
  createBy!: number;

  @UpdateDateColumn({ name: "change_time", type: "timestamp" })
  changeTime!: Date;

  @Column("integer", { name: "change_by", nullable: false })
  changeBy!: number;
}
