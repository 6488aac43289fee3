import { format } from "date-fns";
import { describe, expect, it } from "vitest";

import { triggerHumanReadable } from "./triggerHumanReadable.js";

describe("triggerHumanReadable", () => {
    it("describes cron specs", () => {
        expect(triggerHumanReadable("cron:0 9 * * 1-5")).toBe("Cron schedule: 0 9 * * 1-5");
    });

    it("pluralizes interval and relative units", () => {
        expect(triggerHumanReadable("every 1h")).toBe("Every 1 hour");
        expect(triggerHumanReadable("every 2h")).toBe("Every 2 hours");
        expect(triggerHumanReadable("every 1s")).toBe("Every 1 second");
        expect(triggerHumanReadable("every 45m")).toBe("Every 45 minutes");
        expect(triggerHumanReadable("in 1d")).toBe("In 1 day");
        expect(triggerHumanReadable("in 3d")).toBe("In 3 days");
    });

    it("formats absolute dates in local time", () => {
        const instant = new Date(2026, 5, 1, 7, 5, 9);
        expect(triggerHumanReadable("at:2026-06-01T07:05:09")).toBe(`At ${format(instant, "yyyy-MM-dd HH:mm:ss")}`);
        expect(triggerHumanReadable("at:2026-06-01T07:05:09")).toBe("At 2026-06-01 07:05:09");
    });

    it("falls back to the raw date text", () => {
        expect(triggerHumanReadable("at:someday")).toBe("At someday");
    });

    it("echoes malformed or unknown specs verbatim", () => {
        expect(triggerHumanReadable("every 5w")).toBe("every 5w");
        expect(triggerHumanReadable("in soon")).toBe("in soon");
        expect(triggerHumanReadable("bogus")).toBe("bogus");
        expect(triggerHumanReadable("")).toBe("");
    });

    it("is deterministic", () => {
        expect(triggerHumanReadable("every 10s")).toBe(triggerHumanReadable("every 10s"));
    });
});
