import { describe, expect, it } from "vitest";
import {
  DEFAULT_WHO_SCOPE,
  NoticeSchema,
  TimeScopeSchema,
  WhoScopeSchema,
  encodeNotice,
  encodeTimeScope,
  encodeWhoScope,
  isDefaultWhoScope,
  noticeDate,
  type Notice,
  type TimeScope,
  type WhoScope,
} from "../src/notice.js";
import { decode, encodeJson, safeDecode } from "../src/serde.js";

describe("WhoScope", () => {
  it("treats no section and thirty 0 as everyone", () => {
    expect(isDefaultWhoScope(DEFAULT_WHO_SCOPE)).toBe(true);
    expect(isDefaultWhoScope({ thirty: 0 })).toBe(true);
    expect(isDefaultWhoScope({ thirty: 1 })).toBe(false);
    expect(isDefaultWhoScope({ section: "A", thirty: 0 })).toBe(false);
  });

  it("reads a null or missing section as no section", () => {
    expect(decode(WhoScopeSchema, { section: null, thirty: 0 })).toEqual({ thirty: 0 });
    expect(decode(WhoScopeSchema, { thirty: 2 })).toEqual({ thirty: 2 });
    expect(decode(WhoScopeSchema, { section: "C", thirty: 1 })).toEqual({
      section: "C",
      thirty: 1,
    });
  });
});

describe("TimeScopeSchema", () => {
  it("reads all-day scopes with and without a last day", () => {
    expect(decode(TimeScopeSchema, { allDay: null })).toEqual({ type: "allDay" });
    expect(decode(TimeScopeSchema, { allDay: "2020-03-05" })).toEqual({
      type: "allDay",
      lastDay: "2020-03-05",
    });
  });

  it("reads a single period", () => {
    expect(decode(TimeScopeSchema, { period: 3 })).toEqual({ type: "period", period: 3 });
  });

  it("rejects malformed dates", () => {
    expect(safeDecode(TimeScopeSchema, { allDay: "2020-3-5" }).success).toBe(false);
  });
});

describe("encodeNotice", () => {
  it("leaves out forWhom of a class-off notice for everyone", () => {
    const notice: Notice = {
      type: "classOff",
      date: "2020-03-01",
      time: { type: "allDay" },
      forWhom: DEFAULT_WHO_SCOPE,
      dayOff: true,
    };

    expect(encodeNotice(notice)).toStrictEqual({
      classOff: { date: "2020-03-01", time: { allDay: null }, dayOff: true },
    });
    expect(encodeJson(encodeNotice(notice))).toBe(
      '{"classOff":{"date":"2020-03-01","time":{"allDay":null},"dayOff":true}}',
    );
  });

  it("keeps forWhom of a narrower class-off notice", () => {
    const notice: Notice = {
      type: "classOff",
      date: "2020-03-01",
      time: { type: "period", period: 2 },
      forWhom: { thirty: 2 },
      dayOff: false,
    };

    expect(encodeNotice(notice)).toStrictEqual({
      classOff: {
        date: "2020-03-01",
        time: { period: 2 },
        forWhom: { section: null, thirty: 2 },
        dayOff: false,
      },
    });
  });

  it("always writes forWhom of an extra class", () => {
    const notice: Notice = {
      type: "extraClass",
      date: "2020-03-01",
      time: new Date("2020-03-01T04:30:00Z"),
      forWhom: DEFAULT_WHO_SCOPE,
    };

    expect(encodeNotice(notice)).toStrictEqual({
      extraClass: {
        date: "2020-03-01",
        time: "2020-03-01T10:30:00+06:00",
        forWhom: { section: null, thirty: 0 },
      },
    });
  });
});

describe("NoticeSchema", () => {
  it("restores the default scope of a class-off notice", () => {
    const notice = decode(NoticeSchema, {
      classOff: { date: "2020-03-01", time: { allDay: "2020-03-03" }, dayOff: true },
    });

    expect(notice).toEqual({
      type: "classOff",
      date: "2020-03-01",
      time: { type: "allDay", lastDay: "2020-03-03" },
      forWhom: { thirty: 0 },
      dayOff: true,
    });
  });

  it("reads an extra class time as an instant", () => {
    const notice = decode(NoticeSchema, {
      extraClass: {
        date: "2020-03-01",
        time: "2020-03-01T10:30:00+06:00",
        forWhom: { section: "B", thirty: 0 },
      },
    });

    expect(notice.type).toBe("extraClass");
    if (notice.type === "extraClass") {
      expect(notice.time.toISOString()).toBe("2020-03-01T04:30:00.000Z");
      expect(notice.forWhom).toEqual({ section: "B", thirty: 0 });
    }
  });

  it("requires forWhom on an extra class", () => {
    const result = safeDecode(NoticeSchema, {
      extraClass: { date: "2020-03-01", time: "2020-03-01T10:30:00+06:00" },
    });
    expect(result.success).toBe(false);
  });

  it("reads class tests in cycle and day space", () => {
    const notice = decode(NoticeSchema, {
      classTest: {
        day: "C",
        cycle: 7,
        period: 2,
        course: "EEE 2105",
        teacher: "SCM",
        extraInfo: "Chapters 1-3",
      },
    });

    expect(notice).toEqual({
      type: "classTest",
      day: "C",
      cycle: 7,
      period: 2,
      course: "EEE 2105",
      teacher: "SCM",
      extraInfo: "Chapters 1-3",
    });
    expect(noticeDate(notice)).toBeUndefined();
  });

  it("rejects unknown tags and objects with more than one tag", () => {
    expect(safeDecode(NoticeSchema, { holiday: { date: "2020-03-01" } }).success).toBe(false);
    expect(
      safeDecode(NoticeSchema, {
        exam: { date: "2020-03-01", course: "Math 2101", extraInfo: "" },
        others: { date: "2020-03-01", message: "Hello" },
      }).success,
    ).toBe(false);
  });

  it("round-trips every variant", () => {
    const notices: Notice[] = [
      {
        type: "classOff",
        date: "2020-03-01",
        time: { type: "allDay" },
        forWhom: { thirty: 0 },
        dayOff: true,
      },
      {
        type: "classOff",
        date: "2020-03-02",
        time: { type: "period", period: 5 },
        forWhom: { section: "A", thirty: 1 },
        dayOff: false,
      },
      {
        type: "extraClass",
        date: "2020-03-04",
        time: new Date("2020-03-04T08:00:00Z"),
        forWhom: { section: "C", thirty: 2 },
      },
      {
        type: "classTest",
        day: "E",
        cycle: 0,
        period: 1,
        course: "ME 2101",
        teacher: "RIS",
        extraInfo: "",
      },
      { type: "exam", date: "2020-06-10", course: "Math 2101", extraInfo: "Full syllabus" },
      { type: "others", date: "2020-03-05", message: "Lab reports due" },
    ];

    for (const notice of notices) {
      expect(decode(NoticeSchema, encodeNotice(notice))).toEqual(notice);
    }
  });

  it("gives the effective date of dated notices", () => {
    expect(noticeDate({ type: "others", date: "2020-03-05", message: "" })).toBe("2020-03-05");
  });
});

describe("scope wire forms", () => {
  it("round-trip who scopes", () => {
    const scopes: WhoScope[] = [{ thirty: 0 }, { thirty: 2 }, { section: "B", thirty: 1 }];
    for (const scope of scopes) {
      expect(decode(WhoScopeSchema, encodeWhoScope(scope))).toStrictEqual(scope);
    }
  });

  it("round-trip time scopes", () => {
    const scopes: TimeScope[] = [
      { type: "allDay" },
      { type: "allDay", lastDay: "2020-03-05" },
      { type: "period", period: 0 },
      { type: "period", period: 255 },
    ];
    for (const scope of scopes) {
      expect(decode(TimeScopeSchema, encodeTimeScope(scope))).toStrictEqual(scope);
    }
  });
});

describe("class-off default scope", () => {
  const wire = {
    classOff: { date: "2020-03-01", time: { allDay: null }, dayOff: true },
  };

  it("leaves out an explicit everyone scope when encoding again", () => {
    const notice = decode(NoticeSchema, {
      classOff: { ...wire.classOff, forWhom: { section: null, thirty: 0 } },
    });

    expect(encodeJson(encodeNotice(notice))).toBe(
      '{"classOff":{"date":"2020-03-01","time":{"allDay":null},"dayOff":true}}',
    );
  });

  it("gives each decoded notice its own scope", () => {
    const first = decode(NoticeSchema, wire);
    const second = decode(NoticeSchema, wire);
    expect(first.type).toBe("classOff");
    if (first.type === "classOff") first.forWhom.thirty = 2;

    expect(encodeJson(encodeNotice(second))).toBe(
      '{"classOff":{"date":"2020-03-01","time":{"allDay":null},"dayOff":true}}',
    );
    expect(isDefaultWhoScope(DEFAULT_WHO_SCOPE)).toBe(true);
  });

  it("cannot change the shared default", () => {
    expect(Object.isFrozen(DEFAULT_WHO_SCOPE)).toBe(true);
  });
});
