export const TARIFF_COLUMNS = [
  "zone_id",
  "zone_description",
  "usage_category",
  "zone_time_zone",
  "zone_valid_from",
  "zone_valid_to",
  "structure_id",
  "structure_valid_from",
  "structure_valid_to",
  "daily_max_amount",
  "vat_percentage",
  "part_id",
  "priority",
  "weekdays",
  "window_start",
  "window_end",
  "part_valid_from",
  "part_valid_to",
  "pricing_kind",
  "unit_amount",
  "step_size_minutes",
  "steps",
  "free_minutes",
] as const;

export type TariffColumn = (typeof TARIFF_COLUMNS)[number];

// One (zone, structure, part) tuple. Values may come from CSV text or from already-parsed JSON.
export type TariffRecord = Partial<Record<TariffColumn, string | number | null>>;

export type LoadOptions = {
  defaultTimeZone: string;
  source?: string;
};
