import { describe, it, expect } from "vitest";
import { checkPin } from "../src/middleware/pinAuth";

describe("checkPin", () => {
  it("accepts the configured PIN", () => {
    expect(checkPin("4321", "4321")).toBeNull();
  });

  it("rejects a missing or wrong PIN", () => {
    expect(checkPin("4321", "1234")).toEqual({ status: 401, error: "Invalid PIN" });
    expect(checkPin("4321", undefined)).toEqual({ status: 401, error: "Invalid PIN" });
    expect(checkPin("4321", ["4321", "4321"])).toEqual({ status: 401, error: "Invalid PIN" });
  });

  it("refuses every request when no PIN is configured", () => {
    expect(checkPin(null, "4321")).toEqual({ status: 500, error: "Server PIN not configured" });
  });
});
