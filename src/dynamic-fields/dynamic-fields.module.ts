import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";
import { dynamicFieldsConfig } from "../config/dynamic-fields.config";
import { DynamicFieldsController } from "./dynamic-fields.controller";
import { DynamicField } from "./entities/dynamic-field.entity";
import { DynamicFieldScreenConfig } from "./entities/dynamic-field-screen-config.entity";
import { DynamicFieldValue } from "./entities/dynamic-field-value.entity";
import { DynamicFieldFilterService } from "./filters/dynamic-field-filter.service";
import { CLOCK, systemClock } from "./services/clock";
import { DynamicFieldImportExportService } from "./services/dynamic-field-import-export.service";
import { DynamicFieldScreenConfigService } from "./services/dynamic-field-screen-config.service";
import { DynamicFieldValuesService } from "./services/dynamic-field-values.service";
import { DynamicFieldsService } from "./services/dynamic-fields.service";
import { SearchableFieldCache } from "./services/searchable-field-cache.service";

@Module({
  imports: [
    TypeOrmModule.forFeature([DynamicField, DynamicFieldValue, DynamicFieldScreenConfig]),
    ConfigModule.forFeature(dynamicFieldsConfig),
  ],
  controllers: [DynamicFieldsController],
  providers: [
    DynamicFieldsService,
    DynamicFieldValuesService,
    DynamicFieldScreenConfigService,
    SearchableFieldCache,
    DynamicFieldFilterService,
    DynamicFieldImportExportService,
    {
      provide: CLOCK, // wall clock for cache freshness
      useValue: systemClock,
    },
  ],
  exports: [
    DynamicFieldsService,
    DynamicFieldValuesService,
    DynamicFieldScreenConfigService,
    SearchableFieldCache,
    DynamicFieldFilterService,
  ],
})
export class DynamicFieldsModule {}
