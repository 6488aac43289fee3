import { describe, expect, it } from "vitest";

import { cronTimezoneResolve } from "./cronTimezoneResolve.js";

describe("cronTimezoneResolve", () => {
    it("defaults to UTC", () => {
        expect(cronTimezoneResolve(undefined)).toBe("UTC");
        expect(cronTimezoneResolve("  ")).toBe("UTC");
    });

    it("keeps known identifiers", () => {
        expect(cronTimezoneResolve(" America/New_York ")).toBe("America/New_York");
    });

    it("throws for unknown identifiers", () => {
        expect(() => cronTimezoneResolve("Mars/Olympus")).toThrow("Invalid scheduler timezone: Mars/Olympus");
    });
});
