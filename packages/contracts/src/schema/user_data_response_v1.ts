import { z } from "zod";
import { LocationSampleV1Schema } from "./location_sample_v1";

export const UserDataResponseV1Schema = z.object({
  user_id: z.string(),
  data: z.array(LocationSampleV1Schema),
});

export type UserDataResponseV1 = z.infer<typeof UserDataResponseV1Schema>;
