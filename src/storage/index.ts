/**
 * Storage barrel export
 */

export { ConfigStore } from "./config-store.js";
