export {
  BenchmarkScoreTable,
  loadBenchmarkTable,
  readBenchmarkRecords,
  roundScore,
} from "./benchmark.js";
export {
  UNKNOWN_REGION_NAME,
  buildRegionStore,
  loadRegionStore,
  readRegionSource,
  regionKeyFor,
  regionPropertyBags,
  resolveObjectName,
  type Region,
  type RegionGeometryStore,
  type RegionKey,
  type RegionStoreOptions,
} from "./regions.js";
export { InputFileError, inputFileError } from "./errors.js";
export {
  BenchmarkDumpSchema,
  RegionSourceSchema,
  type BenchmarkRecord,
  type FeatureCollectionSource,
  type RegionSource,
  type TopologySource,
} from "./schemas.js";
