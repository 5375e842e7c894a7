import { describe, expect, it } from "vitest";

import { ErrorCode, ErrorMessages } from "../index";

describe("ErrorCode", () => {
  it("uses the key as the value for every code", () => {
    for (const [key, value] of Object.entries(ErrorCode)) {
      expect(value).toBe(key);
    }
  });

  it("has resolution codes", () => {
    expect(ErrorCode.DOMAIN_VIOLATION).toBe("DOMAIN_VIOLATION");
    expect(ErrorCode.UNRESOLVED_ANCHOR).toBe("UNRESOLVED_ANCHOR");
  });
});

describe("ErrorMessages", () => {
  it("maps every ErrorCode value to a non-empty string", () => {
    for (const code of Object.values(ErrorCode)) {
      expect(ErrorMessages[code].length).toBeGreaterThan(0);
    }
  });
});
