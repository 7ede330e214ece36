import { getArg } from "./lib/args";
import { loadPipelineConfig } from "../src/market/config";
import { createMarketViewAccessor } from "../src/market/view";

const argv = process.argv.slice(2);
const symbol = getArg(argv, "symbol");
if (!symbol) {
  throw new Error("Usage: market-view --symbol <SYMBOL>");
}

const config = await loadPipelineConfig();
const view = await createMarketViewAccessor(config).getView(symbol);
console.log(JSON.stringify(view, null, 2));
