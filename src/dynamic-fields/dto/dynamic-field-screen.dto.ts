import { ApiProperty } from "@nestjs/swagger";
import { IsInt, IsNotEmpty, IsObject, IsString } from "class-validator";

export class SetScreenLevelsDto {
  @ApiProperty({
    type: Object,
    description: "Screen key to level (0 disabled, 1 enabled, 2 required)",
    example: { AgentTicketPhone: 2, AgentTicketZoom: 1 },
  })
  @IsObject()
  levels!: Record<string, number>;
}

export class SetScreenLevelDto {
  @ApiProperty({ type: String, example: "AgentTicketPhone" })
  @IsString()
  @IsNotEmpty()
  screenKey!: string;

  @ApiProperty({ type: Number, example: 1 })
  @IsInt()
  level!: number;
}
