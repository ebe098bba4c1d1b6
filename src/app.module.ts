import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { DatabaseModule } from "./common/database.module";
import { DynamicFieldsModule } from "./dynamic-fields/dynamic-fields.module";
import { HealthController } from "./health.controller";

/**
 * Root module: global configuration, the database connection and the
 * dynamic field feature module.
 */
@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }), // Global configuration management
    DatabaseModule, // Database connectivity
    DynamicFieldsModule, // Dynamic field definitions, values, screens and search
  ],
  controllers: [HealthController],
})
export class AppModule {}
