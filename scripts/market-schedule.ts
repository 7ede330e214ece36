import { getSymbolsArg, hasFlag } from "./lib/args";
import { sleep } from "../src/market/concurrency";
import { loadPipelineConfig } from "../src/market/config";
import { CancelledError, errorMessage } from "../src/market/errors";
import { runMarketPipeline } from "../src/market/pipeline";

const argv = process.argv.slice(2);
const symbols = getSymbolsArg(argv);
const once = hasFlag(argv, "once");

const config = await loadPipelineConfig();
const intervalMs = config.schedule.intervalHours * 60 * 60 * 1000;

const controller = new AbortController();
for (const sig of ["SIGINT", "SIGTERM"] as const) {
  process.once(sig, () => {
    console.log(`[market:schedule] ${sig} received; stopping after the current step`);
    controller.abort();
  });
}

console.log(`[market:schedule] running every ${config.schedule.intervalHours}h`);

while (!controller.signal.aborted) {
  try {
    const report = await runMarketPipeline({ asOf: new Date(), symbols, signal: controller.signal });
    console.log(`[market:schedule] run ${report.runId} finished: ${JSON.stringify(report.totals)}`);
  } catch (error) {
    // A bad run (config, symbols) is logged and retried on the next tick.
    console.error(`[market:schedule] run failed: ${errorMessage(error)}`);
  }

  if (once) {
    break;
  }

  try {
    await sleep(intervalMs, controller.signal);
  } catch (error) {
    if (!(error instanceof CancelledError)) {
      throw error;
    }
  }
}

console.log("[market:schedule] stopped");
