export type TariffErrorCode =
  | "INVALID_INTERVAL"
  | "UNKNOWN_ZONE"
  | "NO_TARIFF_COVERAGE"
  | "MALFORMED_TARIFF_DATA"
  | "ADDRESS_NOT_FOUND"
  | "ZONE_NOT_MAPPED";

export class TariffError extends Error {
  readonly code: TariffErrorCode;
  constructor(code: TariffErrorCode, message: string) {
    super(message);
    this.name = "TariffError";
    this.code = code;
  }
}

export class InvalidIntervalError extends TariffError {
  constructor(message: string) {
    super("INVALID_INTERVAL", message);
    this.name = "InvalidIntervalError";
  }
}

export class UnknownZoneError extends TariffError {
  readonly zoneId: string;
  constructor(zoneId: string) {
    super("UNKNOWN_ZONE", `Unknown zone: ${zoneId}`);
    this.name = "UnknownZoneError";
    this.zoneId = zoneId;
  }
}

export class NoTariffCoverageError extends TariffError {
  readonly zoneId: string;
  readonly at: Date;
  constructor(zoneId: string, at: Date, detail?: string) {
    super("NO_TARIFF_COVERAGE", `No tariff covers zone ${zoneId} at ${at.toISOString()}${detail ? ` (${detail})` : ""}`);
    this.name = "NoTariffCoverageError";
    this.zoneId = zoneId;
    this.at = at;
  }
}

export type MalformedRecordIssue = { row: number; field: string; message: string };

export class MalformedTariffDataError extends TariffError {
  readonly issues: MalformedRecordIssue[];
  constructor(issues: MalformedRecordIssue[]) {
    const head = issues
      .slice(0, 5)
      .map((i) => `row ${i.row} ${i.field}: ${i.message}`)
      .join("; ");
    const more = issues.length > 5 ? ` (+${issues.length - 5} more)` : "";
    super("MALFORMED_TARIFF_DATA", `Malformed tariff data: ${head}${more}`);
    this.name = "MalformedTariffDataError";
    this.issues = issues;
  }
}

export class AddressNotFoundError extends TariffError {
  constructor(message: string) {
    super("ADDRESS_NOT_FOUND", message);
    this.name = "AddressNotFoundError";
  }
}

export class ZoneNotMappedError extends TariffError {
  constructor(message: string) {
    super("ZONE_NOT_MAPPED", message);
    this.name = "ZoneNotMappedError";
  }
}
