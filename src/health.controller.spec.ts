import { Test, TestingModule } from "@nestjs/testing";
import { DataSource } from "typeorm";
import { LoggerUtil } from "./common/logger/LoggerUtil";
import { HealthController } from "./health.controller";

describe("HealthController", () => {
  let controller: HealthController;
  let query: jest.Mock<Promise<unknown[]>, [string]>;

  beforeEach(async () => {
    query = jest.fn<Promise<unknown[]>, [string]>().mockResolvedValue([]);

    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        {
          provide: DataSource,
          useValue: { query },
        },
      ],
    }).compile();

    controller = module.get<HealthController>(HealthController);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should check the connection and every dynamic field table", async () => {
    const result = await controller.getHealth();

    expect(query.mock.calls.map(([sql]) => sql)).toEqual([
      "SELECT 1",
      "SELECT 1 FROM dynamic_field LIMIT 1",
      "SELECT 1 FROM dynamic_field_value LIMIT 1",
      "SELECT 1 FROM dynamic_field_screen_config LIMIT 1",
    ]);
    expect(result.id).toBe("api.dynamicfield.health");
    expect(result.result).toEqual({
      checks: [
        { name: "postgres db", healthy: true },
        { name: "dynamic_field", healthy: true },
        { name: "dynamic_field_value", healthy: true },
        { name: "dynamic_field_screen_config", healthy: true },
      ],
      healthy: true,
    });
  });

  it("should report a missing table as unhealthy and log it", async () => {
    const warn = jest.spyOn(LoggerUtil, "warn").mockImplementation(() => undefined);
    query.mockImplementation(async (sql) => {
      if (sql.includes("dynamic_field_value")) {
        throw new Error('relation "dynamic_field_value" does not exist');
      }
      return [];
    });

    const result = await controller.getHealth();

    expect(result.responseCode).toBe("OK");
    expect(result.result.healthy).toBe(false);
    expect(result.result.checks).toEqual([
      { name: "postgres db", healthy: true },
      { name: "dynamic_field", healthy: true },
      { name: "dynamic_field_value", healthy: false },
      { name: "dynamic_field_screen_config", healthy: true },
    ]);
    expect(warn).toHaveBeenCalledWith(
      'Health check dynamic_field_value failed: relation "dynamic_field_value" does not exist',
      "api.dynamicfield.health"
    );
  });
});
