import { ConfigType, registerAs } from "@nestjs/config";

function readInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const dynamicFieldsConfig = registerAs("dynamicFields", () => ({
  // Searchable-field snapshot freshness, in seconds
  cacheTtlSeconds: readInt(process.env.DYNAMIC_FIELD_CACHE_TTL_SECONDS, 30),
  filterPrefix: process.env.DYNAMIC_FIELD_FILTER_PREFIX || "df_",
  systemUserId: readInt(process.env.DYNAMIC_FIELD_SYSTEM_USER_ID, 1),
  distinctValuesLimit: readInt(
    process.env.DYNAMIC_FIELD_DISTINCT_VALUES_LIMIT,
    100
  ),
}));

export type DynamicFieldsConfig = ConfigType<typeof dynamicFieldsConfig>;
