import { z } from "zod";

/**
 * LocationSampleV1Schema
 *
 * On-disk and on-wire shape of one displacement sample.
 * `ts` is RFC-3339 with an explicit offset ("Z" or "+hh:mm").
 */
export const LocationSampleV1Schema = z.object({
  dx: z.number().finite(),
  dy: z.number().finite(),
  ts: z.string().datetime({ offset: true }),
});

export type LocationSampleV1 = z.infer<typeof LocationSampleV1Schema>;
