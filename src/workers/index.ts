export { createUniverseApi } from "./universe-api";
