/**
 * API ID Configuration
 *
 * Unique identifiers for every API endpoint. They tag log entries and the
 * `id` member of each response envelope.
 *
 * Naming Convention:
 * - Format: 'api.{module}.{action}'
 * - All IDs are lowercase with dots as separators
 */
export const APIID = {
  HEALTH: "api.dynamicfield.health",

  // Field definitions
  DYNAMIC_FIELD_LIST: "api.dynamicfield.list",
  DYNAMIC_FIELD_LIST_GROUPED: "api.dynamicfield.listgrouped",
  DYNAMIC_FIELD_GET: "api.dynamicfield.get",
  DYNAMIC_FIELD_CREATE: "api.dynamicfield.create",
  DYNAMIC_FIELD_UPDATE: "api.dynamicfield.update",
  DYNAMIC_FIELD_DELETE: "api.dynamicfield.delete",

  // Values
  DYNAMIC_FIELD_VALUES_GET: "api.dynamicfield.values.get",
  DYNAMIC_FIELD_VALUE_SET: "api.dynamicfield.values.set",
  DYNAMIC_FIELD_DISPLAY: "api.dynamicfield.display",
  DYNAMIC_FIELD_FORM: "api.dynamicfield.form",
  DYNAMIC_FIELD_DISTINCT_VALUES: "api.dynamicfield.distinctvalues",

  // Screens
  DYNAMIC_FIELD_SCREEN_MATRIX: "api.dynamicfield.screens.matrix",
  DYNAMIC_FIELD_SCREEN_BULK_SET: "api.dynamicfield.screens.bulkset",
  DYNAMIC_FIELD_SCREEN_SET: "api.dynamicfield.screens.set",

  // Search
  DYNAMIC_FIELD_SEARCHABLE: "api.dynamicfield.searchable",
  DYNAMIC_FIELD_FILTER: "api.dynamicfield.filter",

  // Import / export
  DYNAMIC_FIELD_EXPORT: "api.dynamicfield.export",
  DYNAMIC_FIELD_IMPORT_PREVIEW: "api.dynamicfield.import.preview",
  DYNAMIC_FIELD_IMPORT: "api.dynamicfield.import",
};
