import fs from "node:fs/promises";

import { createLogger } from "@/lib/log";
import { AddressNotFoundError, ZoneNotMappedError } from "@/lib/tariff/errors";

import type { AddressQuery, PostcodeZoneEntry, ResolvedZone, ZoneResolver } from "./types";

const log = createLogger("zone-lookup");

export function normalizePostcode(raw: unknown): string | null {
  const s = String(raw ?? "").replace(/\s+/g, "").toUpperCase();
  return /^[1-9]\d{3}[A-Z]{2}$/.test(s) ? s : null;
}

export function parseHouseNumber(raw: unknown): number | null {
  const s = String(raw ?? "").trim();
  if (!/^\d{1,5}$/.test(s)) return null;
  const n = Number(s);
  return n > 0 ? n : null;
}

function inRange(e: PostcodeZoneEntry, houseNumber: number): boolean {
  if (e.houseNumberFrom != null && houseNumber < e.houseNumberFrom) return false;
  if (e.houseNumberTo != null && houseNumber > e.houseNumberTo) return false;
  return true;
}

function optStr(v: unknown): string | null {
  return typeof v === "string" && v.trim() ? v.trim() : null;
}

function optInt(v: unknown): number | null {
  return typeof v === "number" && Number.isInteger(v) ? v : null;
}

/**
 * Validates the decoded JSON table. Entries need a postcode (full or 4-digit prefix) and a zoneId.
 */
export function parsePostcodeTable(raw: unknown): PostcodeZoneEntry[] {
  const list: unknown = raw && typeof raw === "object" && "entries" in raw ? raw.entries : raw;
  if (!Array.isArray(list)) throw new Error("Postcode table must be an array or { entries: [] }");

  const out: PostcodeZoneEntry[] = [];
  list.forEach((item: unknown, idx: number) => {
    if (!item || typeof item !== "object") throw new Error(`Postcode table entry ${idx} is not an object`);
    const postcodeRaw = "postcode" in item ? String(item.postcode ?? "").replace(/\s+/g, "").toUpperCase() : "";
    const zoneId = "zoneId" in item ? optStr(item.zoneId) : null;
    if (!/^[1-9]\d{3}([A-Z]{2})?$/.test(postcodeRaw)) throw new Error(`Postcode table entry ${idx}: invalid postcode`);
    if (!zoneId) throw new Error(`Postcode table entry ${idx}: zoneId required`);
    out.push({
      postcode: postcodeRaw,
      houseNumberFrom: "houseNumberFrom" in item ? optInt(item.houseNumberFrom) : null,
      houseNumberTo: "houseNumberTo" in item ? optInt(item.houseNumberTo) : null,
      zoneId,
      street: "street" in item ? optStr(item.street) : null,
      city: "city" in item ? optStr(item.city) : null,
    });
  });
  return out;
}

/**
 * Static postcode → zone table. A full-postcode entry wins over a 4-digit prefix entry.
 */
export class PostcodeTableResolver implements ZoneResolver {
  private readonly entries: PostcodeZoneEntry[];

  constructor(entries: PostcodeZoneEntry[]) {
    this.entries = entries;
  }

  get size(): number {
    return this.entries.length;
  }

  resolveZone(query: AddressQuery): ResolvedZone {
    const postcode = normalizePostcode(query.postcode);
    if (!postcode) throw new AddressNotFoundError(`Invalid postcode: ${String(query.postcode ?? "")}`);
    const houseNumber = parseHouseNumber(query.houseNumber);
    if (houseNumber == null) throw new AddressNotFoundError(`Invalid house number: ${String(query.houseNumber ?? "")}`);

    const exact = this.entries.find((e) => e.postcode === postcode && inRange(e, houseNumber));
    const prefix = exact ? null : this.entries.find((e) => e.postcode === postcode.slice(0, 4) && inRange(e, houseNumber));
    const hit = exact ?? prefix;
    const suffix = [query.houseLetter, query.addition].map((s) => String(s ?? "").trim()).filter(Boolean).join("-");
    const label = `${postcode} ${houseNumber}${suffix ? ` ${suffix}` : ""}`;

    if (!hit) {
      log.warn("zone_not_mapped", { postcode, houseNumber });
      throw new ZoneNotMappedError(`No parking zone mapped for ${label}`);
    }

    const street = hit.street ? `${hit.street} ${houseNumber}${suffix ? ` ${suffix}` : ""}, ` : "";
    return {
      zoneId: hit.zoneId,
      postcode,
      houseNumber,
      address: `${street}${postcode}${hit.city ? ` ${hit.city}` : ""}`,
      method: exact ? "postcode" : "prefix",
    };
  }
}

export async function loadPostcodeTableFromFile(path: string): Promise<PostcodeTableResolver> {
  const text = await fs.readFile(path, "utf8");
  const parsed: unknown = JSON.parse(text);
  const resolver = new PostcodeTableResolver(parsePostcodeTable(parsed));
  log.info("loaded", { path, entries: resolver.size });
  return resolver;
}
