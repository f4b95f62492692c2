export type { VideoStore } from "./videoStore.js";
export { PgVideoStore } from "./pgVideoStore.js";
export { InMemoryVideoStore } from "./inMemoryVideoStore.js";
