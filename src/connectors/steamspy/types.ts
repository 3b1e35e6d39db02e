/** SteamSpy adapter type definitions. */

import type { JsonObject, JsonValue } from "../core/index.js";

/** `request=appdetails` response. Numeric-looking values arrive as numbers or strings. */
export type SteamSpyAppDetails = {
  appid?: number | string;
  name?: string;
  developer?: string;
  publisher?: string;
  owners?: string;
  positive?: number;
  negative?: number;
  price?: string | null;
  tags?: JsonObject | JsonValue[];
  [field: string]: JsonValue | undefined;
};

/** One value of the `request=all` listing. */
export interface SteamSpyListEntry {
  appid: number;
  name: string;
}
