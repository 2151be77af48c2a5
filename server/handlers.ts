import { createLogger, errorDetails } from "@/lib/log";
import { InvalidIntervalError, MalformedTariffDataError, NoTariffCoverageError, TariffError, UnknownZoneError } from "@/lib/tariff/errors";
import type { TariffErrorCode } from "@/lib/tariff/errors";
import type { CalculationResult } from "@/lib/tariff/types";
import { parseInZoneToUTC } from "@/lib/time/tz";
import type { TariffCalculator } from "@/modules/tariffCalculator/service";
import type { ResolvedZone, ZoneResolver } from "@/modules/zoneLookup/types";
import { describeTariff } from "@/modules/zoneRegistry/describe";
import type { ZoneRegistry } from "@/modules/zoneRegistry/registry";
import type { ZoneRegistrySnapshot } from "@/modules/zoneRegistry/snapshot";
import type { ZoneSummary } from "@/modules/zoneRegistry/types";

const log = createLogger("tariff-server");

export type HandlerResult = { status: number; body: Record<string, unknown> };

export type HandlerDeps = {
  registry: ZoneRegistry;
  calculator: TariffCalculator;
  resolver: ZoneResolver | null;
  reload: () => Promise<ZoneRegistrySnapshot>;
  defaultTimeZone: string;
};

export const STATUS_BY_CODE: Record<TariffErrorCode, number> = {
  INVALID_INTERVAL: 400,
  UNKNOWN_ZONE: 404,
  NO_TARIFF_COVERAGE: 422,
  MALFORMED_TARIFF_DATA: 500,
  ADDRESS_NOT_FOUND: 404,
  ZONE_NOT_MAPPED: 404,
};

export function errorResult(e: unknown): HandlerResult {
  if (e instanceof TariffError) {
    const details = e instanceof MalformedTariffDataError ? { issues: e.issues } : undefined;
    return {
      status: STATUS_BY_CODE[e.code],
      body: { ok: false, error: e.code, message: e.message, ...(details ? { details } : {}) },
    };
  }
  log.error("unhandled", errorDetails(e));
  return { status: 500, body: { ok: false, error: "INTERNAL_ERROR", message: "Internal error" } };
}

/**
 * Result for an error raised by express middleware (body parsing, routing). A 4xx `status` on
 * the error is kept; malformed JSON is a 400; anything else is a 500.
 */
export function middlewareErrorResult(err: unknown): HandlerResult {
  const raw = typeof err === "object" && err !== null ? Reflect.get(err, "status") : undefined;
  let status = 500;
  if (typeof raw === "number" && raw >= 400 && raw < 500) status = raw;
  else if (err instanceof SyntaxError) status = 400;
  return { status, body: { ok: false, error: status < 500 ? "BAD_REQUEST" : "INTERNAL_ERROR" } };
}

function badRequest(message: string): HandlerResult {
  return { status: 400, body: { ok: false, error: "BAD_REQUEST", message } };
}

function field(body: object, key: string): unknown {
  return key in body ? Reflect.get(body, key) : undefined;
}

function text(v: unknown): string {
  return typeof v === "string" || typeof v === "number" ? String(v).trim() : "";
}

function euros(cents: number): number {
  return Math.round(cents) / 100;
}

function serializeZone(z: ZoneSummary): Record<string, unknown> {
  return { ...z, validFrom: z.validFrom.toISOString(), validTo: z.validTo?.toISOString() ?? null };
}

export function serializeResult(r: CalculationResult): Record<string, unknown> {
  return {
    zoneId: r.zoneId,
    startTime: r.startTime.toISOString(),
    endTime: r.endTime.toISOString(),
    durationMinutes: r.durationMinutes,
    freeMinutesApplied: r.freeMinutesApplied,
    total: euros(r.totalCents),
    totalCents: r.totalCents,
    vatCents: r.vatCents,
    cappedByDailyMax: r.cappedByDailyMax,
    lineItems: r.lineItems.map((i) => ({
      ...i,
      intervalStart: i.intervalStart.toISOString(),
      intervalEnd: i.intervalEnd.toISOString(),
      amount: euros(i.amountCents),
    })),
  };
}

function parseAt(raw: unknown, zone: string): Date {
  const s = text(raw);
  if (!s) return new Date();
  const d = parseInZoneToUTC(s, zone);
  if (!d) throw new InvalidIntervalError(`Invalid timestamp: ${s}`);
  return d;
}

/**
 * POST /calculate. Accepts `zoneId`, or `postcode` + `houseNumber` (optional `houseLetter`,
 * `addition`), plus `startTime` and `endTime`. Wall times are read in the zone's time zone.
 */
export function handleCalculate(deps: HandlerDeps, body: unknown): HandlerResult {
  try {
    if (!body || typeof body !== "object") return badRequest("JSON body required");

    const startRaw = text(field(body, "startTime"));
    const endRaw = text(field(body, "endTime"));
    if (!startRaw || !endRaw) return badRequest("startTime and endTime are required");

    let zoneId = text(field(body, "zoneId"));
    let resolved: ResolvedZone | null = null;
    if (!zoneId) {
      const postcode = text(field(body, "postcode"));
      const houseNumber = text(field(body, "houseNumber"));
      if (!postcode || !houseNumber) return badRequest("zoneId or postcode + houseNumber required");
      if (!deps.resolver) return { status: 503, body: { ok: false, error: "LOOKUP_UNAVAILABLE", message: "Address lookup is not configured" } };
      resolved = deps.resolver.resolveZone({
        postcode,
        houseNumber,
        houseLetter: text(field(body, "houseLetter")) || null,
        addition: text(field(body, "addition")) || null,
      });
      zoneId = resolved.zoneId;
    }

    const snapshot = deps.registry.current();
    const zone = snapshot.getZone(zoneId);
    if (!zone) throw new UnknownZoneError(zoneId);

    const start = parseInZoneToUTC(startRaw, zone.timeZone);
    const end = parseInZoneToUTC(endRaw, zone.timeZone);
    if (!start || !end) throw new InvalidIntervalError("startTime and endTime must be ISO timestamps");

    const result = deps.calculator.calculate(zoneId, start, end, snapshot);
    return {
      status: 200,
      body: {
        ok: true,
        ...serializeResult(result),
        ...(resolved ? { address: resolved.address, zoneDetection: resolved.method } : {}),
      },
    };
  } catch (e) {
    return errorResult(e);
  }
}

export function handleListZones(deps: HandlerDeps, atRaw?: unknown): HandlerResult {
  try {
    const at = parseAt(atRaw, deps.defaultTimeZone);
    const zones = deps.registry.current().listZones(at);
    return { status: 200, body: { ok: true, count: zones.length, zones: zones.map(serializeZone) } };
  } catch (e) {
    return errorResult(e);
  }
}

export function handleSearchZones(deps: HandlerDeps, q: unknown): HandlerResult {
  const term = text(q);
  if (!term) return badRequest("q is required");
  const zones = deps.registry.current().searchZones(term);
  return { status: 200, body: { ok: true, count: zones.length, zones: zones.map(serializeZone) } };
}

export function handleDescribeTariff(deps: HandlerDeps, zoneId: string, atRaw?: unknown): HandlerResult {
  try {
    const snapshot = deps.registry.current();
    const zone = snapshot.getZone(zoneId);
    if (!zone) throw new UnknownZoneError(zoneId);
    const at = parseAt(atRaw, zone.timeZone);
    const tariff = describeTariff(snapshot, zoneId, at);
    if (!tariff) throw new NoTariffCoverageError(zoneId, at);
    return {
      status: 200,
      body: {
        ok: true,
        tariff: {
          ...tariff,
          validFrom: tariff.validFrom.toISOString(),
          validTo: tariff.validTo?.toISOString() ?? null,
        },
      },
    };
  } catch (e) {
    return errorResult(e);
  }
}

export function handleHealth(deps: HandlerDeps): HandlerResult {
  const snapshot = deps.registry.current();
  return {
    status: 200,
    body: {
      ok: true,
      version: deps.registry.currentVersion(),
      source: snapshot.source,
      loadedAt: snapshot.loadedAt.toISOString(),
      ...snapshot.stats(),
    },
  };
}

export async function handleRefresh(deps: HandlerDeps): Promise<HandlerResult> {
  try {
    const next = await deps.registry.refresh(deps.reload);
    return {
      status: 200,
      body: { ok: true, version: deps.registry.currentVersion(), source: next.source, ...next.stats() },
    };
  } catch (e) {
    return errorResult(e);
  }
}
