export { BarStore, assertBarSequence } from "./BarStore";
export { loadBarsFromCsv, parseBarsCsv } from "./csvLoader";
export type { BarField, CsvBarOptions } from "./csvLoader";
export {
	loadBarsFromOhlcvJson,
	mapCcxtOhlcvToBar,
	mapOhlcvRows,
} from "./utils/ccxtMapper";
