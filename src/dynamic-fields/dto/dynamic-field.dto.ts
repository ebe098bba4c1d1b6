import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { Expose } from "class-transformer";
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
} from "class-validator";
import { FieldInput } from "../types/field-definition";
import { FIELD_TYPES, FieldType, OBJECT_TYPES, ObjectType } from "../types/field-types";

export class DynamicFieldDto implements FieldInput {
  //name
  @ApiProperty({
    type: String,
    description: "Unique alphanumeric name of the field",
    example: "Priority1",
  })
  @IsString()
  @IsNotEmpty()
  @Expose()
  name!: string;

  //label
  @ApiPropertyOptional({
    type: String,
    description: "Label shown to users; defaults to the name",
  })
  @IsOptional()
  @IsString()
  @Expose()
  label?: string;

  //fieldOrder
  @ApiPropertyOptional({ type: Number, default: 1 })
  @IsOptional()
  @IsInt()
  @Expose()
  fieldOrder?: number;

  //fieldType
  @ApiProperty({ enum: FieldType, default: FieldType.TEXT })
  @IsIn(FIELD_TYPES)
  @Expose()
  fieldType!: string;

  //objectType
  @ApiPropertyOptional({ enum: ObjectType, default: ObjectType.TICKET })
  @IsOptional()
  @IsIn(OBJECT_TYPES)
  @Expose()
  objectType?: string;

  //validId
  @ApiPropertyOptional({ type: Number, description: "1 = valid", default: 1 })
  @IsOptional()
  @IsInt()
  @Expose()
  validId?: number;

  //internalField
  @ApiPropertyOptional({ type: Boolean, default: false })
  @IsOptional()
  @IsBoolean()
  @Expose()
  internalField?: boolean;

  //config
  @ApiPropertyOptional({
    type: Object,
    description: "Type specific configuration, e.g. { PossibleValues: { 1: 'Low' } }",
  })
  @IsOptional()
  @IsObject()
  @Expose()
  config?: Record<string, unknown>;

  //possibleValuesText
  @ApiPropertyOptional({
    type: String,
    description: "Possible values, one `key=label` per line",
  })
  @IsOptional()
  @IsString()
  @Expose()
  possibleValuesText?: string;

  //autoConfig
  @ApiPropertyOptional({
    type: Boolean,
    description: "Use the default configuration of the field type",
  })
  @IsOptional()
  @IsBoolean()
  @Expose()
  autoConfig?: boolean;
}
