export {
  createSteamSpyParser,
  fetchSteamSpyAppList,
  STEAMSPY_API_URL,
  steamSpyItemProvider,
  steamSpyPlaceholder,
  steamSpySource,
} from "./adapter.js";
export { STEAMSPY_COLUMNS } from "./columns.js";
export type { SteamSpyAppDetails, SteamSpyListEntry } from "./types.js";
