import { Injectable } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { DataSource, In, Repository } from "typeorm";
import { LoggerUtil } from "../../common/logger/LoggerUtil";
import { DynamicFieldScreenConfig } from "../entities/dynamic-field-screen-config.entity";
import { ValidationError } from "../errors/dynamic-field.errors";
import { FieldDefinition } from "../types/field-definition";
import { ObjectType, ScreenLevel, isScreenLevel } from "../types/field-types";
import {
  ScreenDefinition,
  getScreenDefinition,
  getScreensForObjectType,
} from "../types/screen-definitions";
import { DynamicFieldsService } from "./dynamic-fields.service";
import { withStorage } from "./storage.util";

export interface ScreenConfigEntry {
  fieldId: number;
  screenKey: string;
  level: ScreenLevel;
}

export interface FieldOnScreen {
  field: FieldDefinition;
  level: ScreenLevel;
}

export interface ScreenMatrixCell {
  screenKey: string;
  level: ScreenLevel;
  supportsRequired: boolean;
  isDisplayOnly: boolean;
}

export interface ScreenMatrix {
  objectType: ObjectType;
  fields: FieldDefinition[];
  screens: ScreenDefinition[];
  rows: Array<{ field: FieldDefinition; cells: ScreenMatrixCell[] }>;
}

function toEntry(row: DynamicFieldScreenConfig): ScreenConfigEntry {
  return { fieldId: row.fieldId, screenKey: row.screenKey, level: row.configValue };
}

/**
 * Checks that a level may be stored for a field on a screen.
 */
export function validateScreenLevel(
  field: FieldDefinition,
  screenKey: string,
  level: number
): ScreenLevel {
  const screen = getScreenDefinition(screenKey);
  if (!screen) {
    throw new ValidationError("screenKey", `unknown screen: ${screenKey}`);
  }
  if (screen.objectType !== field.objectType) {
    throw new ValidationError(
      "screenKey",
      `screen ${screenKey} does not show ${field.objectType} fields`
    );
  }
  if (!isScreenLevel(level)) {
    throw new ValidationError("level", `invalid screen level: ${level}`);
  }
  if (
    level === ScreenLevel.REQUIRED &&
    (screen.isDisplayOnly || !screen.supportsRequired)
  ) {
    throw new ValidationError(
      "level",
      `screen ${screenKey} does not support required fields`
    );
  }
  return level;
}

@Injectable()
export class DynamicFieldScreenConfigService {
  constructor(
    @InjectRepository(DynamicFieldScreenConfig)
    private readonly screenConfigRepository: Repository<DynamicFieldScreenConfig>,
    private readonly fieldsService: DynamicFieldsService,
    private readonly dataSource: DataSource
  ) {}

  async getConfigForField(fieldId: number): Promise<ScreenConfigEntry[]> {
    const rows = await withStorage("get screen config for field", () =>
      this.screenConfigRepository.find({
        where: { fieldId },
        order: { screenKey: "ASC" },
      })
    );
    return rows.map(toEntry);
  }

  async getConfigForScreen(screenKey: string): Promise<ScreenConfigEntry[]> {
    const rows = await withStorage("get screen config for screen", () =>
      this.screenConfigRepository.find({
        where: { screenKey },
        order: { fieldId: "ASC" },
      })
    );
    return rows.map(toEntry);
  }

  /** Active fields of the object type shown on the screen, in field order. */
  async getFieldsForScreen(
    screenKey: string,
    objectType: ObjectType
  ): Promise<FieldOnScreen[]> {
    const levels = new Map<number, ScreenLevel>();
    for (const entry of await this.getConfigForScreen(screenKey)) {
      if (entry.level > ScreenLevel.DISABLED) {
        levels.set(entry.fieldId, entry.level);
      }
    }

    const result: FieldOnScreen[] = [];
    for (const field of await this.fieldsService.listActive(objectType)) {
      const level = levels.get(field.id);
      if (level !== undefined) {
        result.push({ field, level });
      }
    }
    return result;
  }

  async getMatrix(objectType: ObjectType): Promise<ScreenMatrix> {
    const fields = await this.fieldsService.list({ objectType });
    const screens = getScreensForObjectType(objectType);

    const levels = new Map<string, ScreenLevel>();
    if (fields.length > 0) {
      const rows = await withStorage("get screen config matrix", () =>
        this.screenConfigRepository.find({
          where: { fieldId: In(fields.map((field) => field.id)) },
        })
      );
      for (const row of rows) {
        levels.set(`${row.fieldId}:${row.screenKey}`, row.configValue);
      }
    }

    return {
      objectType,
      fields,
      screens,
      rows: fields.map((field) => ({
        field,
        cells: screens.map((screen) => ({
          screenKey: screen.key,
          level: levels.get(`${field.id}:${screen.key}`) ?? ScreenLevel.DISABLED,
          supportsRequired: screen.supportsRequired,
          isDisplayOnly: screen.isDisplayOnly,
        })),
      })),
    };
  }

  async setForField(
    fieldId: number,
    screenKey: string,
    level: number,
    userId: number
  ): Promise<void> {
    const field = await this.fieldsService.getById(fieldId);
    const checked = validateScreenLevel(field, screenKey, level);

    await withStorage("set screen config", async () => {
      if (checked === ScreenLevel.DISABLED) {
        await this.screenConfigRepository.delete({ fieldId, screenKey });
        return;
      }

      const existing = await this.screenConfigRepository.findOne({
        where: { fieldId, screenKey },
      });
      if (existing) {
        existing.configValue = checked;
        existing.changeBy = userId;
        await this.screenConfigRepository.save(existing);
      } else {
        await this.screenConfigRepository.save(
          this.screenConfigRepository.create({
            fieldId,
            screenKey,
            configValue: checked,
            createBy: userId,
            changeBy: userId,
          })
        );
      }
    });
  }

  /**
   * Replaces every screen row of a field. All levels are validated before
   * anything is written.
   */
  async bulkSetForField(
    fieldId: number,
    levels: Record<string, number>,
    userId: number
  ): Promise<void> {
    const field = await this.fieldsService.getById(fieldId);
    const entries = Object.entries(levels).map(([screenKey, level]) => ({
      screenKey,
      level: validateScreenLevel(field, screenKey, level),
    }));

    await withStorage("bulk set screen config", () =>
      this.dataSource.transaction(async (manager) => {
        const repository = manager.getRepository(DynamicFieldScreenConfig);
        await repository.delete({ fieldId });
        const rows = entries
          .filter((entry) => entry.level !== ScreenLevel.DISABLED)
          .map((entry) =>
            repository.create({
              fieldId,
              screenKey: entry.screenKey,
              configValue: entry.level,
              createBy: userId,
              changeBy: userId,
            })
          );
        if (rows.length > 0) {
          await repository.save(rows);
        }
      })
    );

    LoggerUtil.log(
      `Screen configuration of dynamic field ${field.name} replaced`,
      "DynamicFieldScreenConfigService",
      userId
    );
  }
}
