/**
 * SteamSpy source: per-app details plus the full app listing used as the
 * item list for every source.
 */

import type {
  DataSource,
  Fetcher,
  Item,
  ItemId,
  ItemProvider,
  RecordParser,
} from "../core/index.js";
import { isJsonObject, toAppId } from "../core/index.js";
import { STEAMSPY_COLUMNS } from "./columns.js";
import type { SteamSpyAppDetails, SteamSpyListEntry } from "./types.js";

export const STEAMSPY_API_URL = "https://steamspy.com/api.php";

export function createSteamSpyParser(fetcher: Fetcher): RecordParser {
  return async (id, name) => {
    const body = await fetcher.get(STEAMSPY_API_URL, {
      request: "appdetails",
      appid: id,
    });
    if (isJsonObject(body)) {
      return body;
    }
    return steamSpyPlaceholder(id, name);
  };
}

export function steamSpyPlaceholder(
  id: ItemId,
  name: string,
): SteamSpyAppDetails {
  return { appid: id, name };
}

/**
 * Fetches `request=all` and returns its apps ordered by app id.
 * Entries without a usable app id are dropped; a missing name becomes "".
 */
export async function fetchSteamSpyAppList(fetcher: Fetcher): Promise<Item[]> {
  const body = await fetcher.get(STEAMSPY_API_URL, { request: "all" });
  if (!isJsonObject(body)) {
    throw new Error("SteamSpy app list response is not an object");
  }

  const entries: SteamSpyListEntry[] = [];
  for (const value of Object.values(body)) {
    if (!isJsonObject(value)) continue;
    const appid = toAppId(value.appid);
    if (appid === null) continue;
    entries.push({
      appid,
      name: typeof value.name === "string" ? value.name : "",
    });
  }

  entries.sort((a, b) => a.appid - b.appid);
  return entries.map((e) => ({ id: e.appid, name: e.name }));
}

export const steamSpyItemProvider: ItemProvider = {
  fetchItems: fetchSteamSpyAppList,
};

export const steamSpySource: DataSource = {
  name: "steamspy",
  columns: STEAMSPY_COLUMNS,
  dataFile: "steamspy_data.csv",
  checkpointFile: "steamspy_index.txt",
  defaults: { batchSize: 100, pauseMs: 300 },
  createParser: createSteamSpyParser,
};
