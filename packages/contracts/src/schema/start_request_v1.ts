import { z } from "zod";

// Longest user id /start accepts. The server sizes its path-param limit from it,
// so every id that can be started can also be fetched through /user/:userId.
export const MAX_USER_ID_LENGTH = 256;

// POST /start body. Empty strings pass here; the supervisor filters them.
export const StartRequestV1Schema = z.object({
  user_ids: z
    .array(z.string().max(MAX_USER_ID_LENGTH, `user id longer than ${MAX_USER_ID_LENGTH} characters`))
    .min(1, "user_ids cannot be empty"),
});

export type StartRequestV1 = z.infer<typeof StartRequestV1Schema>;
