export * from "./types/game";
export { formatElapsed } from "./libs/elapsed";
