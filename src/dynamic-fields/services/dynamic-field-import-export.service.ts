import { Injectable } from "@nestjs/common";
import { LoggerUtil } from "../../common/logger/LoggerUtil";
import { configToDocument } from "../codec/config-codec";
import {
  parseExportDocument,
  stringifyExportDocument,
} from "../codec/export-document.codec";
import { errorMessage } from "../errors/dynamic-field.errors";
import {
  DynamicFieldExport,
  ExportedField,
  ExportedScreenConfig,
  ImportItemResult,
  ImportOptions,
  ImportPreview,
  ImportPreviewField,
  ImportResult,
} from "../types/export-document";
import { FieldDefinition, FieldInput } from "../types/field-definition";
import { DynamicFieldScreenConfigService } from "./dynamic-field-screen-config.service";
import { DynamicFieldsService } from "./dynamic-fields.service";

const CONTEXT = "DynamicFieldImportExportService";

function toExportedField(field: FieldDefinition): ExportedField {
  return {
    Name: field.name,
    Label: field.label,
    FieldOrder: field.fieldOrder,
    FieldType: field.fieldType,
    ObjectType: field.objectType,
    ValidID: field.validId,
    InternalField: field.internalField ? 1 : 0,
    Config: configToDocument(field.config),
  };
}

function toFieldInput(entry: ExportedField): FieldInput {
  return {
    name: entry.Name,
    label: entry.Label,
    fieldOrder: entry.FieldOrder,
    fieldType: entry.FieldType,
    objectType: entry.ObjectType,
    validId: entry.ValidID,
    internalField: entry.InternalField === 1,
    config: entry.Config,
  };
}

@Injectable()
export class DynamicFieldImportExportService {
  constructor(
    private readonly fieldsService: DynamicFieldsService,
    private readonly screenConfigService: DynamicFieldScreenConfigService
  ) {}

  /**
   * Builds an export bundle for the named fields, in registry order.
   * Unknown names are ignored. When `screenNames` is given, screen rows are
   * exported only for those fields.
   */
  async export(
    names: string[],
    includeScreens: boolean,
    screenNames?: string[]
  ): Promise<DynamicFieldExport> {
    const wanted = new Set(names);
    const fields = (await this.fieldsService.list()).filter((field) =>
      wanted.has(field.name)
    );

    const document: DynamicFieldExport = {
      DynamicFields: fields.map(toExportedField),
    };

    if (includeScreens) {
      const screenFields = screenNames ? new Set(screenNames) : wanted;
      const screens: ExportedScreenConfig[] = [];
      for (const field of fields.filter((candidate) => screenFields.has(candidate.name))) {
        for (const entry of await this.screenConfigService.getConfigForField(field.id)) {
          screens.push({
            FieldName: field.name,
            ScreenKey: entry.screenKey,
            ConfigValue: entry.level,
          });
        }
      }
      document.DynamicFieldScreens = screens;
    }
    return document;
  }

  async exportYaml(
    names: string[],
    includeScreens: boolean,
    screenNames?: string[]
  ): Promise<string> {
    return stringifyExportDocument(await this.export(names, includeScreens, screenNames));
  }

  parseDocument(text: string): DynamicFieldExport {
    return parseExportDocument(text);
  }

  /** Describes what an import would do. Nothing is written. */
  async preview(document: DynamicFieldExport): Promise<ImportPreview> {
    const fields: ImportPreviewField[] = [];
    for (const entry of document.DynamicFields) {
      const existing = await this.fieldsService.findByName(entry.Name);
      fields.push({
        name: entry.Name,
        label: entry.Label,
        fieldType: entry.FieldType,
        objectType: entry.ObjectType,
        exists: existing !== null,
        typeConflict: existing !== null && existing.fieldType !== entry.FieldType,
      });
    }

    const screenConfigFields: string[] = [];
    for (const screen of document.DynamicFieldScreens ?? []) {
      if (!screenConfigFields.includes(screen.FieldName)) {
        screenConfigFields.push(screen.FieldName);
      }
    }
    return { fields, screenConfigFields };
  }

  /**
   * Imports the selected fields in document order, then the selected
   * screen configurations. Each item succeeds or fails on its own.
   */
  async import(
    document: DynamicFieldExport,
    options: ImportOptions,
    userId: number
  ): Promise<ImportResult> {
    const selectedFields = new Set(options.fieldNames);
    const fields: ImportItemResult[] = [];
    for (const entry of document.DynamicFields) {
      if (selectedFields.has(entry.Name)) {
        fields.push(await this.importField(entry, options.overwrite, userId));
      }
    }

    const selectedScreens = new Set(options.screenNames);
    const levelsByField = new Map<string, Record<string, number>>();
    for (const screen of document.DynamicFieldScreens ?? []) {
      if (!selectedScreens.has(screen.FieldName)) {
        continue;
      }
      const levels = levelsByField.get(screen.FieldName) ?? {};
      levels[screen.ScreenKey] = screen.ConfigValue;
      levelsByField.set(screen.FieldName, levels);
    }

    const screens: ImportItemResult[] = [];
    for (const [name, levels] of levelsByField) {
      screens.push(await this.importScreens(name, levels, userId));
    }

    LoggerUtil.log(
      `Dynamic field import finished: ${fields.length} field(s), ${screens.length} screen configuration(s)`,
      CONTEXT,
      userId
    );
    return { fields, screens };
  }

  private async importField(
    entry: ExportedField,
    overwrite: boolean,
    userId: number
  ): Promise<ImportItemResult> {
    const name = entry.Name;
    try {
      const existing = await this.fieldsService.findByName(name);
      if (!existing) {
        await this.fieldsService.create(toFieldInput(entry), userId);
        return { name, status: "created" };
      }
      if (!overwrite) {
        return { name, status: "skipped", message: "field already exists" };
      }
      if (existing.fieldType !== entry.FieldType) {
        return {
          name,
          status: "failed",
          message: `field type mismatch: existing ${existing.fieldType}, import ${entry.FieldType}`,
        };
      }
      await this.fieldsService.update(
        existing.id,
        { ...toFieldInput(entry), objectType: existing.objectType },
        userId
      );
      return { name, status: "updated" };
    } catch (error) {
      LoggerUtil.warn(`Import of dynamic field ${name} failed: ${errorMessage(error)}`, CONTEXT);
      return { name, status: "failed", message: errorMessage(error) };
    }
  }

  private async importScreens(
    name: string,
    levels: Record<string, number>,
    userId: number
  ): Promise<ImportItemResult> {
    try {
      const field = await this.fieldsService.findByName(name);
      if (!field) {
        return { name, status: "skipped", message: "field not found" };
      }
      await this.screenConfigService.bulkSetForField(field.id, levels, userId);
      return { name, status: "updated" };
    } catch (error) {
      LoggerUtil.warn(
        `Import of screen configuration for ${name} failed: ${errorMessage(error)}`,
        CONTEXT
      );
      return { name, status: "failed", message: errorMessage(error) };
    }
  }
}
