import { z } from "zod";

export const OCEAN_PROXIMITY_VALUES = ["<1H OCEAN", "INLAND", "ISLAND", "NEAR BAY", "NEAR OCEAN"] as const;

export const NUMERIC_FEATURES = [
  "longitude",
  "latitude",
  "housing_median_age",
  "total_rooms",
  "total_bedrooms",
  "population",
  "households",
  "median_income",
] as const;

/** Model input columns in training order: numeric features, then one-hot ocean proximity. */
export const FEATURE_COLUMNS: readonly string[] = [
  ...NUMERIC_FEATURES,
  ...OCEAN_PROXIMITY_VALUES.map((v) => `ocean_proximity_${v}`),
];

const nonNegative = z.number().finite().min(0);

export const houseFeaturesSchema = z.object({
  longitude: z.number().finite().min(-180).max(180),
  latitude: z.number().finite().min(-90).max(90),
  housing_median_age: nonNegative.max(100),
  total_rooms: nonNegative,
  total_bedrooms: nonNegative,
  population: nonNegative,
  households: nonNegative,
  median_income: nonNegative,
  ocean_proximity: z.enum(OCEAN_PROXIMITY_VALUES),
});

export type HouseFeatures = z.infer<typeof houseFeaturesSchema>;

export const MAX_BATCH_SIZE = 100;

export const batchPredictionSchema = z.object({
  houses: z.array(houseFeaturesSchema).min(1).max(MAX_BATCH_SIZE),
});

/** Encode validated features as the model's input vector. */
export function encodeFeatures(features: HouseFeatures): number[] {
  return [
    ...NUMERIC_FEATURES.map((name) => features[name]),
    ...OCEAN_PROXIMITY_VALUES.map((v) => (features.ocean_proximity === v ? 1 : 0)),
  ];
}
