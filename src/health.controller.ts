import { Controller, Get } from "@nestjs/common";
import { DataSource } from "typeorm";
import { v4 as uuidv4 } from "uuid";
import { LoggerUtil } from "./common/logger/LoggerUtil";
import { APIID } from "./common/utils/api-id.config";

export interface HealthCheck {
  name: string;
  healthy: boolean;
}

// every table the dynamic field engine reads or writes
const DYNAMIC_FIELD_TABLES = [
  "dynamic_field",
  "dynamic_field_value",
  "dynamic_field_screen_config",
];

@Controller()
export class HealthController {
  constructor(private readonly dataSource: DataSource) {}

  @Get("health")
  async getHealth() {
    const checks: HealthCheck[] = [await this.check("postgres db", "SELECT 1")];
    for (const table of DYNAMIC_FIELD_TABLES) {
      checks.push(await this.check(table, `SELECT 1 FROM ${table} LIMIT 1`));
    }

    return {
      id: APIID.HEALTH,
      ver: "1.0",
      ts: new Date().toISOString(),
      params: {
        resmsgid: uuidv4(),
        err: null,
        status: "successful",
        errmsg: null,
      },
      responseCode: "OK",
      result: {
        checks,
        healthy: checks.every((check) => check.healthy),
      },
    };
  }

  private async check(name: string, sql: string): Promise<HealthCheck> {
    try {
      await this.dataSource.query(sql);
      return { name, healthy: true };
    } catch (error) {
      LoggerUtil.warn(
        `Health check ${name} failed: ${error instanceof Error ? error.message : String(error)}`,
        APIID.HEALTH
      );
      return { name, healthy: false };
    }
  }
}
