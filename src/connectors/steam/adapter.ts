/**
 * Steam Store source: one `appdetails` request per app.
 */

import type {
  DataSource,
  Fetcher,
  ItemId,
  JsonValue,
  RecordParser,
} from "../core/index.js";
import { isJsonObject } from "../core/index.js";
import { STEAM_COLUMNS } from "./columns.js";
import type { SteamAppDetails, SteamAppDetailsEnvelope } from "./types.js";

export const STEAM_APPDETAILS_URL =
  "https://store.steampowered.com/api/appdetails/";

export function createSteamParser(fetcher: Fetcher): RecordParser {
  return async (id, name) => {
    const body = await fetcher.get(STEAM_APPDETAILS_URL, { appids: id });
    const envelope = readEnvelope(body, id);
    if (envelope?.success && envelope.data) {
      return envelope.data;
    }
    return steamPlaceholder(id, name);
  };
}

/** Record written for apps the store has no details for. */
export function steamPlaceholder(id: ItemId, name: string): SteamAppDetails {
  return { name, steam_appid: id };
}

function readEnvelope(
  body: JsonValue,
  id: ItemId,
): SteamAppDetailsEnvelope | null {
  if (!isJsonObject(body)) return null;
  const entry = body[String(id)];
  if (!isJsonObject(entry)) return null;
  return {
    success: entry.success === true,
    data: isJsonObject(entry.data) ? entry.data : undefined,
  };
}

export const steamSource: DataSource = {
  name: "steam",
  columns: STEAM_COLUMNS,
  dataFile: "steam_app_data.csv",
  checkpointFile: "steam_index.txt",
  defaults: { batchSize: 100, pauseMs: 1_000 },
  createParser: createSteamParser,
};
