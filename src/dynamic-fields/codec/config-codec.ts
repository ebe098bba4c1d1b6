import { parse, stringify } from "yaml";
import { ParseError, errorMessage } from "../errors/dynamic-field.errors";
import { FieldType } from "../types/field-types";
import {
  DATE_RESTRICTIONS,
  DateConfig,
  DateRestriction,
  FieldConfig,
  RegEx,
  SelectionConfig,
  TypedFieldConfig,
} from "../types/field-config";

type ConfigDocument = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isEmptyMember(value: unknown): boolean {
  if (value === undefined || value === null || value === "" || value === 0) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return isRecord(value) && Object.keys(value).length === 0;
}

/**
 * Encodes a field configuration as YAML bytes. Zero and empty members are
 * left out so exports stay small and diffable.
 */
export function serializeConfig(config: FieldConfig | null | undefined): Buffer {
  if (config === null || config === undefined) {
    return Buffer.alloc(0);
  }

  const document = configToDocument(config);
  return Buffer.from(stringify(document, { sortMapEntries: true }), "utf8");
}

/** Plain mapping of the non-empty members of a configuration. */
export function configToDocument(config: FieldConfig): ConfigDocument {
  const document: ConfigDocument = {};
  const entries: Array<[string, unknown]> = Object.entries(config);
  for (const [key, value] of entries) {
    if (!isEmptyMember(value)) {
      document[key] = value;
    }
  }
  return document;
}

/**
 * Decodes a stored configuration blob for the given field type. An empty
 * blob yields the type's zero configuration; members that do not belong to
 * the type are dropped.
 */
export function parseConfig(
  fieldType: FieldType,
  raw: Buffer | string | null | undefined
): TypedFieldConfig {
  const document = readDocument(raw);
  return buildConfig(fieldType, document);
}

/**
 * Builds the typed configuration for a field type out of a loose document,
 * e.g. the decoded `Config` mapping of an import bundle.
 */
export function buildConfig(
  fieldType: FieldType,
  document: ConfigDocument
): TypedFieldConfig {
  switch (fieldType) {
    case FieldType.TEXT:
      return {
        fieldType,
        config: compact({
          DefaultValue: readString(document, "DefaultValue"),
          MaxLength: readNumber(document, "MaxLength"),
          RegExList: readRegExList(document),
          Link: readString(document, "Link"),
          LinkPreview: readString(document, "LinkPreview"),
        }),
      };
    case FieldType.TEXTAREA:
      return {
        fieldType,
        config: compact({
          DefaultValue: readString(document, "DefaultValue"),
          MaxLength: readNumber(document, "MaxLength"),
          RegExList: readRegExList(document),
          Rows: readNumber(document, "Rows"),
          Cols: readNumber(document, "Cols"),
        }),
      };
    case FieldType.CHECKBOX:
      return {
        fieldType,
        config: compact({ DefaultValue: readString(document, "DefaultValue") }),
      };
    case FieldType.DROPDOWN:
    case FieldType.MULTISELECT:
      return { fieldType, config: readSelectionConfig(document) };
    case FieldType.DATE:
    case FieldType.DATETIME:
      return { fieldType, config: readDateConfig(document) };
  }
}

function readDocument(raw: Buffer | string | null | undefined): ConfigDocument {
  const text = Buffer.isBuffer(raw) ? raw.toString("utf8") : raw ?? "";
  if (text.trim() === "") {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parse(text);
  } catch (error) {
    throw new ParseError(
      `failed to parse dynamic field config: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ParseError("dynamic field config must be a mapping");
  }
  return parsed;
}

function readSelectionConfig(document: ConfigDocument): SelectionConfig {
  const possibleValues: Record<string, string> = {};
  const raw = document.PossibleValues;
  if (raw !== undefined && raw !== null) {
    if (!isRecord(raw)) {
      throw new ParseError("PossibleValues must be a mapping");
    }
    for (const [key, label] of Object.entries(raw)) {
      possibleValues[key] = scalarToString("PossibleValues." + key, label);
    }
  }

  return {
    ...compact({
      DefaultValue: readString(document, "DefaultValue"),
      PossibleNone: readNumber(document, "PossibleNone"),
      TranslatableValues: readNumber(document, "TranslatableValues"),
      TreeView: readNumber(document, "TreeView"),
    }),
    PossibleValues: possibleValues,
  };
}

function readDateConfig(document: ConfigDocument): DateConfig {
  return compact({
    DefaultValue: readString(document, "DefaultValue"),
    YearsInPast: readNumber(document, "YearsInPast"),
    YearsInFuture: readNumber(document, "YearsInFuture"),
    YearsPeriod: readNumber(document, "YearsPeriod"),
    DateRestriction: readDateRestriction(document),
  });
}

function readDateRestriction(document: ConfigDocument): DateRestriction | undefined {
  const value = readString(document, "DateRestriction");
  if (value === undefined) {
    return undefined;
  }
  const restriction = DATE_RESTRICTIONS.find((candidate) => candidate === value);
  if (!restriction) {
    throw new ParseError(`unknown DateRestriction: ${value}`);
  }
  return restriction;
}

function readRegExList(document: ConfigDocument): RegEx[] | undefined {
  const raw = document.RegExList;
  if (raw === undefined || raw === null) {
    return undefined;
  }
  if (!Array.isArray(raw)) {
    throw new ParseError("RegExList must be a list");
  }
  return raw.map((entry: unknown, index) => {
    if (!isRecord(entry)) {
      throw new ParseError(`RegExList[${index}] must be a mapping`);
    }
    return {
      Value: scalarToString(`RegExList[${index}].Value`, entry.Value ?? ""),
      ErrorMessage: scalarToString(
        `RegExList[${index}].ErrorMessage`,
        entry.ErrorMessage ?? ""
      ),
    };
  });
}

function readString(document: ConfigDocument, key: string): string | undefined {
  const value = document[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  return scalarToString(key, value);
}

function readNumber(document: ConfigDocument, key: string): number | undefined {
  const value = document[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  const parsed = typeof value === "string" ? Number(value.trim()) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed)) {
    throw new ParseError(`${key} must be a number`);
  }
  return parsed;
}

function scalarToString(key: string, value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  throw new ParseError(`${key} must be a scalar`);
}

// Drops undefined members so parsed configs compare equal to hand-built ones
function compact<T extends object>(config: T): T {
  const result = { ...config };
  for (const key of Object.keys(result)) {
    if (Reflect.get(result, key) === undefined) {
      Reflect.deleteProperty(result, key);
    }
  }
  return result;
}
