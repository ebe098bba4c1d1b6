import { parse, stringify } from "yaml";
import { ParseError, errorMessage } from "../errors/dynamic-field.errors";
import {
  DynamicFieldExport,
  ExportedField,
  ExportedScreenConfig,
} from "../types/export-document";
import { isRecord } from "./config-codec";

export function stringifyExportDocument(document: DynamicFieldExport): string {
  return stringify(document);
}

function readText(entry: Record<string, unknown>, key: string, where: string): string {
  const value = entry[key];
  if (typeof value === "string" && value.trim() !== "") {
    return value.trim();
  }
  if (typeof value === "number") {
    return String(value);
  }
  throw new ParseError(`${where}: ${key} is required`);
}

function readOptionalText(entry: Record<string, unknown>, key: string, fallback: string): string {
  const value = entry[key];
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  if (typeof value === "string" || typeof value === "number") {
    return String(value);
  }
  throw new ParseError(`${key} must be a scalar`);
}

function readInteger(entry: Record<string, unknown>, key: string, fallback: number): number {
  const value = entry[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isInteger(parsed)) {
    throw new ParseError(`${key} must be an integer`);
  }
  return parsed;
}

function readField(raw: unknown, index: number): ExportedField {
  const where = `DynamicFields[${index}]`;
  if (!isRecord(raw)) {
    throw new ParseError(`${where} must be a mapping`);
  }

  const name = readText(raw, "Name", where);
  const config = raw.Config ?? {};
  if (!isRecord(config)) {
    throw new ParseError(`${where}: Config must be a mapping`);
  }

  return {
    Name: name,
    Label: readOptionalText(raw, "Label", name),
    FieldOrder: readInteger(raw, "FieldOrder", 1),
    FieldType: readText(raw, "FieldType", where),
    ObjectType: readOptionalText(raw, "ObjectType", "Ticket"),
    ValidID: readInteger(raw, "ValidID", 1),
    InternalField: readInteger(raw, "InternalField", 0),
    Config: config,
  };
}

function readScreen(raw: unknown, index: number): ExportedScreenConfig {
  const where = `DynamicFieldScreens[${index}]`;
  if (!isRecord(raw)) {
    throw new ParseError(`${where} must be a mapping`);
  }
  return {
    FieldName: readText(raw, "FieldName", where),
    ScreenKey: readText(raw, "ScreenKey", where),
    ConfigValue: readInteger(raw, "ConfigValue", 0),
  };
}

/**
 * Parses an export bundle. Only the shape is checked here; field types and
 * configurations are validated when the bundle is imported.
 */
export function parseExportDocument(text: string): DynamicFieldExport {
  let parsed: unknown;
  try {
    parsed = parse(text);
  } catch (error) {
    throw new ParseError(`invalid import document: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.DynamicFields)) {
    throw new ParseError("import document must contain a DynamicFields list");
  }

  const document: DynamicFieldExport = {
    DynamicFields: parsed.DynamicFields.map((raw: unknown, index) => readField(raw, index)),
  };

  const screens = parsed.DynamicFieldScreens;
  if (screens !== undefined && screens !== null) {
    if (!Array.isArray(screens)) {
      throw new ParseError("DynamicFieldScreens must be a list");
    }
    document.DynamicFieldScreens = screens.map((raw: unknown, index) => readScreen(raw, index));
  }
  return document;
}
