import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import {
  IsArray,
  IsBoolean,
  IsNotEmpty,
  IsOptional,
  IsString,
} from "class-validator";

export class ExportDynamicFieldsDto {
  @ApiProperty({ type: [String], description: "Fields whose definition is exported" })
  @IsArray()
  @IsString({ each: true })
  fieldNames!: string[];

  @ApiPropertyOptional({
    type: [String],
    description: "Fields whose screen configuration is exported as well",
  })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  screenNames?: string[];
}

export class ImportPreviewDto {
  @ApiProperty({ type: String, description: "YAML export document" })
  @IsString()
  @IsNotEmpty()
  yaml!: string;
}

export class ImportDynamicFieldsDto extends ImportPreviewDto {
  @ApiProperty({ type: [String] })
  @IsArray()
  @IsString({ each: true })
  fieldNames!: string[];

  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  screenNames?: string[];

  @ApiPropertyOptional({ type: Boolean, default: false })
  @IsOptional()
  @IsBoolean()
  overwrite?: boolean;
}
