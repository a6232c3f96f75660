import { z } from "zod";

export const SessionStatusV1Schema = z.object({
  active: z.boolean(),
  session_id: z.string().nullable(),
  user_ids: z.array(z.string()),
  started_at: z.string().datetime({ offset: true }).nullable(),
  deadline_at: z.string().datetime({ offset: true }).nullable(),
});

export type SessionStatusV1 = z.infer<typeof SessionStatusV1Schema>;
