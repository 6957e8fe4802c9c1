import { type AsanaClient } from "./client.ts";
import { parseData } from "./http.ts";
import { type AsanaUser, USER_OPT_FIELDS, userSchema } from "./types.ts";

/** Returns the user the token belongs to. Used to verify a token before saving it. */
export async function getMe(client: AsanaClient): Promise<AsanaUser> {
  const path = "/users/me";
  const res = await client.request(path, { query: { opt_fields: USER_OPT_FIELDS } });
  return parseData(res, userSchema, path);
}
