/** Steam Store adapter type definitions. */

import type { JsonObject, JsonValue } from "../core/index.js";

/** One entry of an `appdetails` response, keyed by app id. */
export interface SteamAppDetailsEnvelope {
  success: boolean;
  data?: JsonObject;
}

/**
 * Fields of `appdetails.data` the collector writes out. Steam omits most
 * of them for unreleased apps, DLC and the like.
 */
export type SteamAppDetails = {
  type?: string;
  name?: string;
  steam_appid?: number | string;
  required_age?: number | string;
  is_free?: boolean;
  developers?: string[];
  publishers?: string[];
  price_overview?: JsonObject;
  platforms?: JsonObject;
  release_date?: JsonObject;
  [field: string]: JsonValue | undefined;
};
