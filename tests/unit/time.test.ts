import { describe, expect, it } from "vitest";
import { checkinPhaseAt, taskLabel } from "../../src/core/entities/task.entity.js";
import { formatZonedDate, formatZonedTime, isValidTimeZone, toZoned } from "../../src/shared/utils/time.js";

describe("zoned time helpers", () => {
  const instant = new Date("2026-10-17T23:00:05Z");

  it("reads the wall clock in the requested zone", () => {
    expect(toZoned(instant, "Asia/Shanghai")).toEqual({ year: 2026, month: 10, day: 18, hour: 7, minute: 0, second: 5 });
    expect(toZoned(instant, "UTC").day).toBe(17);
  });

  it("formats date and time in the zone", () => {
    expect(formatZonedDate(instant, "Asia/Shanghai")).toBe("2026-10-18");
    expect(formatZonedTime(instant, "Asia/Shanghai")).toBe("07:00:05");
    expect(formatZonedTime(instant, "Asia/Kolkata")).toBe("04:30:05");
  });

  it("reports midnight as hour 0", () => {
    expect(formatZonedTime(new Date("2026-10-17T16:00:00Z"), "Asia/Shanghai")).toBe("00:00:00");
  });

  it("recognises IANA zone names", () => {
    expect(isValidTimeZone("Asia/Shanghai")).toBe(true);
    expect(isValidTimeZone("Mars/Olympus_Mons")).toBe(false);
  });
});

describe("check-in window", () => {
  it("maps hours to phases", () => {
    expect(checkinPhaseAt(5)).toBeNull();
    expect(checkinPhaseAt(6)).toBe("morning");
    expect(checkinPhaseAt(11)).toBe("morning");
    expect(checkinPhaseAt(12)).toBe("evening");
    expect(checkinPhaseAt(23)).toBe("evening");
    expect(checkinPhaseAt(0)).toBeNull();
  });

  it("labels tasks", () => {
    expect(taskLabel("checkin", "morning")).toBe("Morning check-in");
    expect(taskLabel("checkin", "evening")).toBe("Evening check-in");
    expect(taskLabel("checkin")).toBe("Check-in");
    expect(taskLabel("daily-report")).toBe("Daily report");
  });
});
