/**
 * Gantry Synthesis Demo
 *
 * Runs the whole pipeline once and prints what came out:
 * 1. Pools load (seed pools unless SYNTH_TRAINING_POOL / SYNTH_BENCHMARK_POOL are set)
 * 2. Records are generated group by group, filtered and rebalanced
 * 3. Accepted records are enhanced, reweighted and split into tiers
 * 4. Direct and indirect evaluation scores are reported
 * 5. A run report is saved under data/runs.json
 *
 * Usage:
 * - npm run build && npm run demo
 * - npm run demo -- --count 50 --verbose --auxiliary
 *
 * The mock oracle is used unless SYNTH_ORACLE_PROVIDER is gemini or openai
 * (with the matching API key in apps/api/.env).
 */

import { config } from "dotenv";
config(); // Load .env file if present

import { join } from "node:path";
import { loadConfig } from "./services/config.js";
import { initLogger, closeLogger } from "./services/logger.js";
import { createSynthesisService } from "./services/pipeline/index.js";
import { RunReportRepository, getCollectionPath, getDataDir } from "./storage/index.js";
import { VEHICLE_CATEGORIES } from "./services/domain/constants.js";
import type { SynthRecord } from "./schemas/index.js";

const args = process.argv.slice(2);
const countFlag = args.indexOf("--count");
const COUNT = countFlag !== -1 ? parseInt(args[countFlag + 1] ?? "", 10) : 20;
const VERBOSE = args.includes("--verbose");
const USE_AUXILIARY = args.includes("--auxiliary");

function describe(record: SynthRecord): string {
  const f = record.fields;
  return (
    `${f.vehicle_category ?? "?"}/${f.time_period ?? "?"}/${f.scenario ?? "?"} ` +
    `type=${f.vehicle_type} axles=${f.axle_count} weight=${f.total_weight}kg ` +
    `fee=${f.pay_fee} (${f.fee_mileage}m) w=${(record.meta.quality_weight ?? 0).toFixed(3)}`
  );
}

async function demo() {
  const settings = loadConfig();
  const dataDir = settings.dataDir ?? getDataDir();
  const logFile = initLogger({ dir: join(dataDir, "logs") });

  console.log("═══════════════════════════════════════════════════════════════");
  console.log("  Gantry Transaction Synthesis");
  console.log("═══════════════════════════════════════════════════════════════\n");
  console.log(`Log file: ${logFile}`);
  console.log(`Oracle: ${settings.oracle.provider}, seed: ${settings.seed}, count: ${COUNT}\n`);

  const service = createSynthesisService(settings, {
    reports: new RunReportRepository(getCollectionPath("runs", dataDir)),
  });
  await service.initialize({ useAuxiliary: USE_AUXILIARY });

  if (VERBOSE) {
    const stats = service.learnedStatistics;
    for (const category of VEHICLE_CATEGORIES) {
      const entry = stats.categories[category];
      if (!entry) continue;
      console.log(
        `  ${category}: ${entry.sampleCount} rows, fee/mileage r=${entry.feeMileageCorrelation.toFixed(3)}`
      );
    }
    console.log();
  }

  const result = await service.generate(COUNT);
  const { statistics, evaluation, quality_tiers } = result;

  console.log("\nTop records:");
  console.log("─".repeat(60));
  for (const record of result.weighted_samples.slice(0, 5)) {
    console.log(`  ${describe(record)}`);
  }

  console.log("\nGeneration:");
  console.log("─".repeat(60));
  console.log(`  Attempts:  ${statistics.attempts}`);
  console.log(`  Accepted:  ${statistics.accepted}/${statistics.requested}`);
  console.log(`  Rejected:  ${statistics.rejected} (recovered ${statistics.recovered})`);
  console.log(`  Fallbacks: ${JSON.stringify(statistics.fallback_groups)}`);
  if (statistics.demonstrations_added > 0) {
    console.log(`  Fed back:  ${statistics.demonstrations_added} record(s) into the demonstrations`);
  }
  console.log(`  Vehicles:  ${JSON.stringify(statistics.accepted_distribution.vehicle)}`);
  console.log(`  Tiers:     high=${quality_tiers.high.length} medium=${quality_tiers.medium.length} low=${quality_tiers.low.length}`);

  console.log("\nEvaluation:");
  console.log("─".repeat(60));
  console.log(`  Faithfulness: ${evaluation.direct.faithfulness.toFixed(3)}`);
  console.log(`  Diversity:    ${evaluation.direct.diversity.toFixed(3)}`);
  console.log(`  Direct:       ${evaluation.direct.overall.toFixed(3)}`);
  for (const [task, score] of Object.entries(evaluation.indirect.open_evaluation)) {
    console.log(`  ${task.padEnd(22)} ${score.toFixed(3)}`);
  }
  console.log(`  Indirect:     ${evaluation.indirect.overall.toFixed(3)}`);

  console.log("\n═══════════════════════════════════════════════════════════════\n");
  closeLogger();
}

demo().catch((error) => {
  console.error("Demo failed:", error);
  process.exit(1);
});
