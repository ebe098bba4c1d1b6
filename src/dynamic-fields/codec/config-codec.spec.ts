import { ParseError } from "../errors/dynamic-field.errors";
import { defaultConfig } from "../types/field-config";
import { FIELD_TYPES, FieldType } from "../types/field-types";
import {
  buildConfig,
  configToDocument,
  parseConfig,
  serializeConfig,
} from "./config-codec";

describe("config codec", () => {
  describe("serializeConfig", () => {
    it("should return an empty blob for a missing config", () => {
      expect(serializeConfig(null).length).toBe(0);
      expect(serializeConfig(undefined).length).toBe(0);
    });

    it("should write keys in sorted order", () => {
      const yaml = serializeConfig({ YearsInPast: 5, DefaultValue: "x" }).toString("utf8");
      expect(yaml).toBe("DefaultValue: x\nYearsInPast: 5\n");
    });
  });

  describe("configToDocument", () => {
    it("should leave out zero and empty members", () => {
      expect(
        configToDocument({ MaxLength: 0, DefaultValue: "", RegExList: [], Rows: 4 })
      ).toEqual({ Rows: 4 });
    });

    it("should leave out an empty PossibleValues mapping", () => {
      expect(configToDocument({ PossibleValues: {}, PossibleNone: 1 })).toEqual({
        PossibleNone: 1,
      });
    });
  });

  describe("parseConfig", () => {
    it.each(FIELD_TYPES)("should round-trip the default %s config", (fieldType) => {
      const typed = defaultConfig(fieldType);
      expect(parseConfig(fieldType, serializeConfig(typed.config))).toEqual(typed);
    });

    it("should round-trip a dropdown config", () => {
      const config = {
        PossibleValues: { high: "High", low: "Low" },
        PossibleNone: 1,
        DefaultValue: "low",
      };
      expect(parseConfig(FieldType.DROPDOWN, serializeConfig(config))).toEqual({
        fieldType: FieldType.DROPDOWN,
        config,
      });
    });

    it("should return the zero config for an empty blob", () => {
      expect(parseConfig(FieldType.TEXT, null)).toEqual({
        fieldType: FieldType.TEXT,
        config: {},
      });
      expect(parseConfig(FieldType.DROPDOWN, Buffer.alloc(0))).toEqual({
        fieldType: FieldType.DROPDOWN,
        config: { PossibleValues: {} },
      });
      expect(parseConfig(FieldType.DATE, "   \n")).toEqual({
        fieldType: FieldType.DATE,
        config: {},
      });
    });

    it("should drop members that do not belong to the type", () => {
      expect(parseConfig(FieldType.CHECKBOX, "DefaultValue: '1'\nMaxLength: 20\n")).toEqual({
        fieldType: FieldType.CHECKBOX,
        config: { DefaultValue: "1" },
      });
    });

    it("should read numbers written as strings", () => {
      expect(parseConfig(FieldType.TEXT, "MaxLength: '50'\n")).toEqual({
        fieldType: FieldType.TEXT,
        config: { MaxLength: 50 },
      });
    });

    it("should throw ParseError for malformed YAML", () => {
      expect(() => parseConfig(FieldType.TEXT, "MaxLength: [1, 2")).toThrow(ParseError);
    });

    it("should throw ParseError when the document is not a mapping", () => {
      expect(() => parseConfig(FieldType.TEXT, "- a\n- b\n")).toThrow(
        "dynamic field config must be a mapping"
      );
    });

    it("should reject an unknown date restriction", () => {
      expect(() =>
        parseConfig(FieldType.DATE, "DateRestriction: Sometimes\n")
      ).toThrow("unknown DateRestriction: Sometimes");
    });
  });

  describe("buildConfig", () => {
    it("should stringify scalar possible value labels", () => {
      expect(buildConfig(FieldType.MULTISELECT, { PossibleValues: { a: 1 } })).toEqual({
        fieldType: FieldType.MULTISELECT,
        config: { PossibleValues: { a: "1" } },
      });
    });

    it("should read a RegExList", () => {
      expect(
        buildConfig(FieldType.TEXTAREA, {
          RegExList: [{ Value: "^\\d+$", ErrorMessage: "digits only" }],
          Rows: 3,
        })
      ).toEqual({
        fieldType: FieldType.TEXTAREA,
        config: {
          RegExList: [{ Value: "^\\d+$", ErrorMessage: "digits only" }],
          Rows: 3,
        },
      });
    });

    it("should reject a PossibleValues list", () => {
      expect(() =>
        buildConfig(FieldType.DROPDOWN, { PossibleValues: ["a", "b"] })
      ).toThrow("PossibleValues must be a mapping");
    });
  });
});
