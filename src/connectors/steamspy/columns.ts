/** Output columns for SteamSpy app details, in file order. */
export const STEAMSPY_COLUMNS = [
  "appid",
  "name",
  "developer",
  "publisher",
  "score_rank",
  "positive",
  "negative",
  "userscore",
  "owners",
  "average_forever",
  "average_2weeks",
  "median_forever",
  "median_2weeks",
  "price",
  "initialprice",
  "discount",
  "languages",
  "genre",
  "ccu",
  "tags",
] as const;
