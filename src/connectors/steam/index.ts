export {
  createSteamParser,
  STEAM_APPDETAILS_URL,
  steamPlaceholder,
  steamSource,
} from "./adapter.js";
export { STEAM_COLUMNS } from "./columns.js";
export type { SteamAppDetails, SteamAppDetailsEnvelope } from "./types.js";
