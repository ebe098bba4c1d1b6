import { Inject, Injectable } from "@nestjs/common";
import { LoggerUtil } from "../../common/logger/LoggerUtil";
import {
  DynamicFieldsConfig,
  dynamicFieldsConfig,
} from "../../config/dynamic-fields.config";
import { FieldDefinition } from "../types/field-definition";
import { FieldType, ObjectType } from "../types/field-types";
import { CLOCK, Clock } from "./clock";
import { DynamicFieldsService } from "./dynamic-fields.service";

export interface SearchOption {
  key: string;
  value: string;
}

export type SearchableField = FieldDefinition & { options: SearchOption[] };

function toSearchableField(field: FieldDefinition): SearchableField {
  if (field.fieldType !== FieldType.DROPDOWN && field.fieldType !== FieldType.MULTISELECT) {
    return { ...field, options: [] };
  }
  const options = Object.keys(field.config.PossibleValues)
    .sort()
    .map((key) => ({ key, value: field.config.PossibleValues[key] }));
  return { ...field, options };
}

/**
 * Snapshot of the active ticket fields offered in search forms. A snapshot
 * is served unchanged until it is older than the configured TTL.
 */
@Injectable()
export class SearchableFieldCache {
  private snapshot: SearchableField[] | null = null;
  private loadedAt = 0;

  constructor(
    private readonly fieldsService: DynamicFieldsService,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(dynamicFieldsConfig.KEY)
    private readonly config: DynamicFieldsConfig
  ) {}

  async get(): Promise<SearchableField[]> {
    const ttlMs = this.config.cacheTtlSeconds * 1000;
    if (this.snapshot && this.clock.now() - this.loadedAt < ttlMs) {
      return [...this.snapshot];
    }

    const fields = await this.fieldsService.listActive(ObjectType.TICKET);
    const snapshot = fields.map(toSearchableField);
    this.snapshot = snapshot;
    this.loadedAt = this.clock.now();
    LoggerUtil.debug(
      `Searchable field cache reloaded with ${snapshot.length} field(s)`,
      "SearchableFieldCache"
    );
    return [...snapshot];
  }

  /** Drops the snapshot so the next read reloads. */
  invalidate(): void {
    this.snapshot = null;
  }
}
