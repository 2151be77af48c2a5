import "dotenv/config";

import { loadConfig } from "@/lib/config";
import { createLogger, errorDetails } from "@/lib/log";
import { TariffCalculator } from "@/modules/tariffCalculator/service";
import { loadTariffDatasetFromFile } from "@/modules/tariffDataset/loader";
import { loadPostcodeTableFromFile } from "@/modules/zoneLookup/postcodeTable";
import type { ZoneResolver } from "@/modules/zoneLookup/types";
import { ZoneRegistry } from "@/modules/zoneRegistry/registry";

import { createApp } from "./app";

const log = createLogger("tariff-server");

async function main() {
  const config = loadConfig();
  const reload = () => loadTariffDatasetFromFile(config.tariffDatasetPath, { defaultTimeZone: config.defaultTimeZone });

  const registry = new ZoneRegistry();
  await registry.refresh(reload);

  let resolver: ZoneResolver | null = null;
  try {
    resolver = await loadPostcodeTableFromFile(config.postcodeZonesPath);
  } catch (e) {
    log.warn("postcode_table_unavailable", { path: config.postcodeZonesPath, ...errorDetails(e) });
  }

  const calculator = new TariffCalculator(registry, { maxSpanMinutes: config.maxSpanMinutes });
  const app = createApp(
    { registry, calculator, resolver, reload, defaultTimeZone: config.defaultTimeZone },
    { adminToken: config.adminToken },
  );

  app.listen(config.port, config.host, () => {
    log.info("listening", {
      host: config.host,
      port: config.port,
      dataset: config.tariffDatasetPath,
      maxSpanMinutes: config.maxSpanMinutes,
      auth: config.adminToken ? "required" : "disabled",
    });
  });
}

main().catch((e) => {
  log.error("startup_failed", errorDetails(e));
  process.exitCode = 1;
});
