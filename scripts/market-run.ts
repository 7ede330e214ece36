import { getAsOfArg, getPositiveIntArg, getSymbolsArg, hasFlag } from "./lib/args";
import { runMarketPipeline } from "../src/market/pipeline";

const argv = process.argv.slice(2);
const report = await runMarketPipeline({
  asOf: getAsOfArg(argv),
  symbols: getSymbolsArg(argv),
  force: hasFlag(argv, "force"),
  concurrency: getPositiveIntArg(argv, "concurrency")
});
console.log(JSON.stringify(report, null, 2));

if (report.totals.failed > 0) {
  process.exitCode = 1;
}
