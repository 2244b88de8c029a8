import "dotenv/config";
import fs from "fs";
import path from "path";
import { loadLifecycleAppConfig } from "../lifecycle-config";
import { parseWorkbook } from "../file-parser";
import { LifecyclePipeline } from "../src/lifecycle/pipeline";
import { fixedClock, systemClock } from "../src/lifecycle/engines/metricsCalculator";
import { renderLifecycleWorkbook } from "../src/lifecycle/render/lifecycleWorkbook";
import { ConfigurationError, SourceTableError } from "../src/lifecycle/errors";

// Usage: run-lifecycle <input.xlsx> [output.xlsx] [--reference-date yyyy-MM-dd]
function runLifecycle() {
  const args = process.argv.slice(2);
  const flagIndex = args.indexOf("--reference-date");
  const referenceDate = flagIndex >= 0 ? args[flagIndex + 1] : undefined;
  const positional = flagIndex >= 0 ? args.filter((_, i) => i !== flagIndex && i !== flagIndex + 1) : args;
  const [inputPath, outputArg] = positional;

  if (!inputPath || (flagIndex >= 0 && !referenceDate)) {
    console.error("Usage: run-lifecycle <input.xlsx> [output.xlsx] [--reference-date yyyy-MM-dd]");
    process.exit(2);
  }

  try {
    const appConfig = loadLifecycleAppConfig();
    const tables = parseWorkbook(fs.readFileSync(inputPath), appConfig.sheets);
    const clock = referenceDate ? fixedClock(referenceDate) : systemClock;
    const result = new LifecyclePipeline(appConfig.pipeline, clock).run(tables);

    const outputPath =
      outputArg ?? path.join(path.dirname(inputPath), `${path.parse(inputPath).name}-lifecycle.xlsx`);
    fs.writeFileSync(outputPath, renderLifecycleWorkbook(result));

    const { summary } = result;
    console.log(`Devices: ${summary.deviceCount}`);
    console.log(`Devices with incidents: ${summary.devicesWithIncidents} (rate ${summary.incidentRate ?? "n/a"})`);
    console.log(`Devices returned: ${summary.devicesReturned} (rate ${summary.returnRate ?? "n/a"})`);
    console.log(`Mean time to failure (${summary.unit}): ${summary.meanTtf ?? "n/a"}`);
    console.log(`Workbook written to ${outputPath}`);
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof SourceTableError) {
      console.error(`${error.name}: ${error.message}`);
      for (const issue of error.issues) console.error(`  - ${issue}`);
    } else {
      console.error("Lifecycle run failed:", error instanceof Error ? error.message : error);
    }
    process.exit(1);
  }
}

runLifecycle();
