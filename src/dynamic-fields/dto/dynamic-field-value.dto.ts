import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { IsIn, IsInt, IsOptional, Min } from "class-validator";
import { ValidationError } from "../errors/dynamic-field.errors";
import { FieldValueData, dateValue, intValue, textValue } from "../types/field-value";

export const VALUE_KINDS = ["text", "int", "date"];

export class SetDynamicFieldValueDto {
  @ApiProperty({ type: Number })
  @IsInt()
  @Min(1)
  fieldId!: number;

  @ApiProperty({ type: Number })
  @IsInt()
  @Min(1)
  objectId!: number;

  @ApiPropertyOptional({
    enum: VALUE_KINDS,
    description: "Value slot; omit to clear the value",
  })
  @IsOptional()
  @IsIn(VALUE_KINDS)
  kind?: string;

  @ApiPropertyOptional({ description: "Text, integer or ISO date depending on kind" })
  @IsOptional()
  value?: string | number;
}

/** Builds the typed value of a set-value request; null clears the value. */
export function toFieldValueData(dto: SetDynamicFieldValueDto): FieldValueData | null {
  if (dto.kind === undefined || dto.value === undefined) {
    return null;
  }
  switch (dto.kind) {
    case "text":
      return textValue(String(dto.value));
    case "int": {
      const int = Number(dto.value);
      if (!Number.isInteger(int)) {
        throw new ValidationError("value", `not an integer: ${dto.value}`);
      }
      return intValue(int);
    }
    case "date": {
      const date = new Date(dto.value);
      if (Number.isNaN(date.getTime())) {
        throw new ValidationError("value", `not a date: ${dto.value}`);
      }
      return dateValue(date);
    }
    default:
      throw new ValidationError("kind", `unknown value kind: ${dto.kind}`);
  }
}
