import { describe, expect, it } from "vitest";
import { batchPredictionSchema, encodeFeatures, FEATURE_COLUMNS, houseFeaturesSchema } from "./features.js";

const HOUSE = {
  longitude: -122.23,
  latitude: 37.88,
  housing_median_age: 41,
  total_rooms: 880,
  total_bedrooms: 129,
  population: 322,
  households: 126,
  median_income: 8.3252,
  ocean_proximity: "NEAR BAY" as const,
};

describe("houseFeaturesSchema", () => {
  it("accepts a valid house", () => {
    expect(houseFeaturesSchema.parse(HOUSE)).toEqual(HOUSE);
  });

  it("rejects out-of-range coordinates and ages", () => {
    expect(houseFeaturesSchema.safeParse({ ...HOUSE, longitude: -181 }).success).toBe(false);
    expect(houseFeaturesSchema.safeParse({ ...HOUSE, latitude: 91 }).success).toBe(false);
    expect(houseFeaturesSchema.safeParse({ ...HOUSE, housing_median_age: 101 }).success).toBe(false);
  });

  it("rejects negative counts", () => {
    expect(houseFeaturesSchema.safeParse({ ...HOUSE, total_rooms: -1 }).success).toBe(false);
  });

  it("rejects an unknown ocean proximity", () => {
    expect(houseFeaturesSchema.safeParse({ ...HOUSE, ocean_proximity: "NEAR LAKE" }).success).toBe(false);
  });

  it("rejects missing fields", () => {
    const { median_income: _omit, ...rest } = HOUSE;
    expect(houseFeaturesSchema.safeParse(rest).success).toBe(false);
  });
});

describe("batchPredictionSchema", () => {
  it("requires between 1 and 100 houses", () => {
    expect(batchPredictionSchema.safeParse({ houses: [] }).success).toBe(false);
    expect(batchPredictionSchema.safeParse({ houses: [HOUSE] }).success).toBe(true);
    expect(batchPredictionSchema.safeParse({ houses: Array(101).fill(HOUSE) }).success).toBe(false);
  });
});

describe("encodeFeatures", () => {
  it("orders numeric features then one-hot columns", () => {
    expect(FEATURE_COLUMNS).toHaveLength(13);
    expect(FEATURE_COLUMNS[8]).toBe("ocean_proximity_<1H OCEAN");
    expect(encodeFeatures(HOUSE)).toEqual([-122.23, 37.88, 41, 880, 129, 322, 126, 8.3252, 0, 0, 0, 1, 0]);
  });

  it("sets exactly one ocean proximity column", () => {
    const encoded = encodeFeatures({ ...HOUSE, ocean_proximity: "<1H OCEAN" });
    expect(encoded.slice(8)).toEqual([1, 0, 0, 0, 0]);
  });
});
