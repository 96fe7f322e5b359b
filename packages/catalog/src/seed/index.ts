export { parseCatalogSeeds } from "./parse";
export { loadCatalogFile, loadReferenceCatalog, REFERENCE_KEYS } from "./reference";
export { type SeedOptions, type SeedReport, seedCatalog } from "./seed";
