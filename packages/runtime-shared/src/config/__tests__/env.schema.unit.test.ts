import { ErrorCode } from "@typeforest/shared-types";
import { describe, expect, it } from "vitest";

import { AppError } from "../../common/errors";
import { envSchema, validateEnv } from "../env.schema";

describe("env.schema", () => {
  describe("envSchema", () => {
    it("applies defaults to an empty environment", () => {
      expect(envSchema.parse({})).toEqual({
        NODE_ENV: "development",
        LOG_FORMAT: "text",
        LOG_LEVEL: "info",
        MIN_SUBSET_SIZE: 2,
        MAX_FIELDS_PER_COLUMN_SET: 20,
        TYPE_NAME_PREFIX: "ColumnSubset",
        CAPABILITY_MARKER: "IColumnSubset",
        FIRST_TYPE_ID: 1,
      });
    });

    it("coerces numeric variables from strings", () => {
      const env = envSchema.parse({
        MIN_SUBSET_SIZE: "3",
        MAX_FIELDS_PER_COLUMN_SET: "12",
        FIRST_TYPE_ID: "10",
      });

      expect(env.MIN_SUBSET_SIZE).toBe(3);
      expect(env.MAX_FIELDS_PER_COLUMN_SET).toBe(12);
      expect(env.FIRST_TYPE_ID).toBe(10);
    });

    it("rejects an enumeration limit above 30", () => {
      expect(
        envSchema.safeParse({ MAX_FIELDS_PER_COLUMN_SET: "31" }).success,
      ).toBe(false);
    });
  });

  describe("validateEnv", () => {
    it("throws CONFIG_ERROR listing each invalid variable", () => {
      let caught: unknown;
      try {
        validateEnv({ TYPE_NAME_PREFIX: "1st", LOG_FORMAT: "xml" });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(AppError);
      if (!(caught instanceof AppError)) {
        throw new Error("Expected AppError");
      }
      expect(caught.code).toBe(ErrorCode.CONFIG_ERROR);
      expect(caught.context?.violations).toHaveLength(2);
      expect(caught.context?.violations).toContain(
        "TYPE_NAME_PREFIX: TYPE_NAME_PREFIX must be a valid identifier",
      );
    });

    it("returns the parsed environment when valid", () => {
      expect(validateEnv({ LOG_LEVEL: "silent" }).LOG_LEVEL).toBe("silent");
    });
  });
});
