export const API_RESPONSES = {
  BAD_REQUEST: "Bad Request",
  INTERNAL_SERVER_ERROR: "Internal Server Error",
  SERVER_ERROR: "Internal server error",
  UNEXPECTED_ERROR: "An unexpected error occurred",

  DYNAMIC_FIELD_LIST: "Dynamic fields fetched successfully",
  DYNAMIC_FIELD_GET: "Dynamic field fetched successfully",
  DYNAMIC_FIELD_CREATED: "Dynamic field created successfully",
  DYNAMIC_FIELD_UPDATED: "Dynamic field updated successfully",
  DYNAMIC_FIELD_DELETED: "Dynamic field deleted successfully",

  VALUES_FETCHED: "Dynamic field values fetched successfully",
  VALUE_SAVED: "Dynamic field value saved successfully",
  FORM_PROCESSED: "Dynamic field form values saved successfully",
  DISTINCT_VALUES_FETCHED: "Distinct values fetched successfully",

  SCREEN_MATRIX_FETCHED: "Screen configuration fetched successfully",
  SCREEN_CONFIG_SAVED: "Screen configuration saved successfully",

  SEARCHABLE_FIELDS_FETCHED: "Searchable fields fetched successfully",
  FILTER_COMPILED: "Filter compiled successfully",

  EXPORT_SUCCESS: "Dynamic fields exported successfully",
  IMPORT_PREVIEW: "Import preview generated successfully",
  IMPORT_SUCCESS: "Dynamic fields import completed",
};
