// ISO weekday numbering (Luxon): 1=Mon..7=Sun
export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export type Zone = {
  zoneId: string;
  description: string;
  usageCategory: string;
  timeZone: string; // IANA, e.g. "Europe/Amsterdam"
  validFrom: Date;
  validTo: Date | null; // null = open-ended
};

// Minutes of the local day. endMinute < startMinute wraps past midnight; 0..1440 is "all day".
export type TimeWindow = {
  startMinute: number;
  endMinute: number;
};

// Local calendar dates "YYYY-MM-DD", both inclusive.
export type DateRange = {
  from: string | null;
  to: string | null;
};

export type PriceStep = { fromMinute: number; amountCents: number };

export type PartPricing =
  | { kind: "flat"; amountCents: number }
  | { kind: "linear"; amountCents: number; stepSizeMinutes: number }
  | { kind: "stepped"; stepSizeMinutes: number; steps: PriceStep[] };

export type PricingKind = PartPricing["kind"];

export type TariffPart = {
  partId: string;
  priority: number; // lower wins; ties keep dataset order
  weekdays: Weekday[];
  window: TimeWindow;
  dates: DateRange;
  pricing: PartPricing;
  freeMinutes: number;
};

export type TariffStructure = {
  structureId: string;
  zoneId: string;
  validFrom: Date;
  validTo: Date | null;
  dailyMaxCents: number | null;
  vatPercentage: number;
  parts: TariffPart[]; // already in match order
};

export type CalculationRequest = {
  zoneId: string;
  startTime: Date;
  endTime: Date;
};

export type LineItem = {
  structureId: string;
  partId: string;
  pricingKind: PricingKind;
  intervalStart: Date;
  intervalEnd: Date;
  localDate: string; // YYYY-MM-DD in the zone's time zone
  minutes: number;
  freeMinutes: number;
  minutesCharged: number;
  grossCents: number; // before the daily cap
  capReductionCents: number;
  amountCents: number;
};

export type CalculationResult = {
  zoneId: string;
  startTime: Date;
  endTime: Date;
  durationMinutes: number;
  freeMinutesApplied: number;
  totalCents: number;
  vatCents: number; // included in totalCents
  cappedByDailyMax: boolean;
  lineItems: LineItem[];
};

export type Interval = { start: Date; end: Date };

// Read side of a registry snapshot, as the engine sees it.
export type TariffSource = {
  getZoneVersions(zoneId: string): Zone[];
  findStructures(zoneId: string, interval: Interval): TariffStructure[];
};
