export { MemoryCatalogStore } from "./memory-store";
