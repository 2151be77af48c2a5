import path from "node:path";

import { DEFAULT_ZONE } from "@/lib/time/tz";

function envStr(key: string, fallback = ""): string {
  const v = process.env[key];
  return typeof v === "string" && v.trim() ? v.trim() : fallback;
}

function envNum(key: string, fallback: number): number {
  const raw = envStr(key, "");
  const n = Number(raw);
  return raw && Number.isFinite(n) ? n : fallback;
}

export type AppConfig = {
  host: string;
  port: number;
  tariffDatasetPath: string;
  postcodeZonesPath: string;
  defaultTimeZone: string;
  maxSpanMinutes: number;
  adminToken: string;
};

export function loadConfig(): AppConfig {
  const maxSpanDays = Math.max(1, envNum("MAX_CALCULATION_SPAN_DAYS", 31));
  return {
    host: envStr("HOST", "127.0.0.1"),
    port: envNum("PORT", 5001),
    tariffDatasetPath: envStr("TARIFF_DATASET_PATH", path.join(process.cwd(), "data", "tariffs.csv")),
    postcodeZonesPath: envStr("POSTCODE_ZONES_PATH", path.join(process.cwd(), "data", "postcode-zones.json")),
    defaultTimeZone: envStr("DEFAULT_TIME_ZONE", DEFAULT_ZONE),
    maxSpanMinutes: Math.round(maxSpanDays * 24 * 60),
    adminToken: envStr("ADMIN_TOKEN", ""),
  };
}
