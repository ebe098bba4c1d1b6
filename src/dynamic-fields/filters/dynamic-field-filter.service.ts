import { Inject, Injectable } from "@nestjs/common";
import {
  DynamicFieldsConfig,
  dynamicFieldsConfig,
} from "../../config/dynamic-fields.config";
import { DynamicFieldsService } from "../services/dynamic-fields.service";
import { FieldDefinition } from "../types/field-definition";
import {
  FilterCondition,
  FilterPlan,
  ResolvedCondition,
  compileFilterPlan,
} from "./filter-plan";
import { parseFilterQuery } from "./filter-query.parser";
import { RenderedFilter, renderPostgresFilter } from "./postgres-filter.renderer";

export interface CompiledFilter extends RenderedFilter {
  plan: FilterPlan;
}

@Injectable()
export class DynamicFieldFilterService {
  constructor(
    private readonly fieldsService: DynamicFieldsService,
    @Inject(dynamicFieldsConfig.KEY)
    private readonly config: DynamicFieldsConfig
  ) {}

  /**
   * Compiles conditions into a parameterized fragment. Placeholders start
   * at `startParam`. Conditions naming an unknown field are dropped.
   */
  async compile(conditions: FilterCondition[], startParam = 1): Promise<CompiledFilter> {
    const resolved: ResolvedCondition[] = [];
    for (const condition of conditions) {
      resolved.push({ condition, field: await this.resolveField(condition) });
    }

    const plan = compileFilterPlan(resolved, startParam);
    return { ...renderPostgresFilter(plan), plan };
  }

  parseQuery(query: Record<string, unknown>): FilterCondition[] {
    return parseFilterQuery(query, this.config.filterPrefix);
  }

  async compileFromQuery(
    query: Record<string, unknown>,
    startParam = 1
  ): Promise<CompiledFilter> {
    return this.compile(this.parseQuery(query), startParam);
  }

  private async resolveField(condition: FilterCondition): Promise<FieldDefinition | null> {
    if (condition.fieldId !== undefined && condition.fieldId > 0) {
      return this.fieldsService.findById(condition.fieldId);
    }
    if (condition.fieldName) {
      return this.fieldsService.findByName(condition.fieldName);
    }
    return null;
  }
}
