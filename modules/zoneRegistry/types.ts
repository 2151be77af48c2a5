export type ZoneSummary = {
  zoneId: string;
  description: string;
  usageCategory: string;
  timeZone: string;
  validFrom: Date;
  validTo: Date | null;
  structureCount: number;
};

export type TariffDescription = {
  zoneId: string;
  description: string;
  timeZone: string;
  structureId: string;
  validFrom: Date;
  validTo: Date | null;
  dailyMaxCents: number | null;
  vatPercentage: number;
  parts: Array<{
    partId: string;
    priority: number;
    weekdays: number[];
    window: { start: string; end: string };
    dates: { from: string | null; to: string | null };
    pricingKind: string;
    amountCents: number | null;
    stepSizeMinutes: number | null;
    steps: Array<{ fromMinute: number; amountCents: number }> | null;
    freeMinutes: number;
  }>;
};
