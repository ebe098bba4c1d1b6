export interface ExportedField {
  Name: string;
  Label: string;
  FieldOrder: number;
  FieldType: string;
  ObjectType: string;
  ValidID: number;
  InternalField: number;
  Config: Record<string, unknown>;
}

export interface ExportedScreenConfig {
  FieldName: string;
  ScreenKey: string;
  ConfigValue: number;
}

/** The YAML bundle exchanged between installations. */
export interface DynamicFieldExport {
  DynamicFields: ExportedField[];
  DynamicFieldScreens?: ExportedScreenConfig[];
}

export interface ImportPreviewField {
  name: string;
  label: string;
  fieldType: string;
  objectType: string;
  exists: boolean;
  typeConflict: boolean;
}

export interface ImportPreview {
  fields: ImportPreviewField[];
  screenConfigFields: string[];
}

export type ImportStatus = "created" | "updated" | "skipped" | "failed";

export interface ImportItemResult {
  name: string;
  status: ImportStatus;
  message?: string;
}

export interface ImportOptions {
  fieldNames: string[];
  screenNames: string[];
  overwrite: boolean;
}

export interface ImportResult {
  fields: ImportItemResult[];
  screens: ImportItemResult[];
}
