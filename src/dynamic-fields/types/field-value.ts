/**
 * A stored dynamic field value. Exactly one typed slot is carried; the
 * three-column physical layout only exists inside the value store.
 */
export type FieldValueData =
  | { kind: "text"; text: string }
  | { kind: "int"; int: number }
  | { kind: "date"; date: Date };

export interface StoredFieldValue {
  id: number;
  fieldId: number;
  objectId: number;
  value: FieldValueData;
}

export const textValue = (text: string): FieldValueData => ({ kind: "text", text });
export const intValue = (int: number): FieldValueData => ({ kind: "int", int });
export const dateValue = (date: Date): FieldValueData => ({ kind: "date", date });
