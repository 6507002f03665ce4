import { z } from 'zod';

// GBFS v1 feeds send ids and flags as numbers, v2 as strings/booleans
const idSchema = z.union([z.string().min(1), z.number()]);

const flagSchema = z
  .union([z.boolean(), z.number().int().min(0).max(1)])
  .default(false)
  .transform((v) => v === true || v === 1);

export const stationSchema = z.object({
  station_id: idSchema,
  name: z.string(),
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});

export const stationInformationSchema = z.object({
  data: z.object({
    stations: z.array(stationSchema).min(1),
  }),
});

export const bikeSchema = z.object({
  bike_id: idSchema.transform(String),
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  is_disabled: flagSchema,
});

export const freeBikeStatusSchema = z.object({
  last_updated: z.number().int().nonnegative(),
  ttl: z.number().nonnegative(),
  data: z.object({
    bikes: z.array(bikeSchema),
  }),
});

export const gbfsDiscoverySchema = z.object({
  data: z.record(
    z.object({
      feeds: z.array(z.object({ name: z.string(), url: z.string().url() })),
    }),
  ),
});

export type StationInformationFeed = z.infer<typeof stationInformationSchema>;
export type FreeBikeStatusFeed = z.infer<typeof freeBikeStatusSchema>;
export type GbfsDiscoveryFeed = z.infer<typeof gbfsDiscoverySchema>;
