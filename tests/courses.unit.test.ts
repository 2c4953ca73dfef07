import { describe, expect, it } from "vitest";
import { CourseCatalog, defaultCourseCatalog, getCourseName } from "../src/courses.js";
import { CourseNotFoundError, ParseError } from "../src/errors.js";

describe("getCourseName", () => {
  it("finds the bundled EEE shop course", () => {
    expect(getCourseName("EEE", "EEE 2100")).toEqual({
      official: "Electrical Shop Practice",
      colloquial: "Electrical Shop",
    });
  });

  it("fails for an unknown code", () => {
    expect(() => getCourseName("EEE", "EEE 2101")).toThrow(CourseNotFoundError);

    const result = defaultCourseCatalog().safeGetCourseName("EEE", "EEE 2101");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.department).toBe("EEE");
      expect(result.error.code).toBe("EEE 2101");
      expect(result.error.message).toBe("No course 'EEE 2101' available for EEE");
    }
  });

  it("fails when the code belongs to another department", () => {
    expect(() => getCourseName("CSE", "EEE 2100")).toThrow(CourseNotFoundError);
  });

  it("does not treat object prototype keys as courses", () => {
    expect(defaultCourseCatalog().safeGetCourseName("EEE", "constructor").success).toBe(false);
  });
});

describe("CourseCatalog", () => {
  it("adds courses without changing the original catalogue", () => {
    const base = defaultCourseCatalog();
    const extended = base.extend({
      CSE: { "CSE 1101": { official: "Computer Fundamentals", colloquial: "CF" } },
      EEE: { "EEE 1101": { official: "Basic Electrical Engineering", colloquial: "BEE" } },
    });

    expect(getCourseName("CSE", "CSE 1101", extended).colloquial).toBe("CF");
    expect(getCourseName("EEE", "EEE 1101", extended).colloquial).toBe("BEE");
    expect(getCourseName("EEE", "EEE 2100", extended).colloquial).toBe("Electrical Shop");
    expect(base.safeGetCourseName("CSE", "CSE 1101").success).toBe(false);
  });

  it("replaces names of an existing code", () => {
    const catalog = CourseCatalog.empty()
      .extend({ ME: { "ME 2101": { official: "Thermodynamics", colloquial: "Thermo" } } })
      .extend({ ME: { "ME 2101": { official: "Thermodynamics I", colloquial: "Thermo I" } } });

    expect(catalog.getCourseName("ME", "ME 2101")).toEqual({
      official: "Thermodynamics I",
      colloquial: "Thermo I",
    });
  });

  it("hands out copies of its names", () => {
    const name = getCourseName("EEE", "EEE 2100");
    name.official = "Renamed";

    expect(defaultCourseCatalog().getCourseName("EEE", "EEE 2100").official).toBe(
      "Electrical Shop Practice",
    );
  });

  it("is not changed by later edits to the added table", () => {
    const additions = {
      CSE: { "CSE 1101": { official: "Computer Fundamentals", colloquial: "CF" } },
    };
    const catalog = CourseCatalog.empty().extend(additions);
    additions.CSE["CSE 1101"].colloquial = "Changed";

    expect(catalog.getCourseName("CSE", "CSE 1101").colloquial).toBe("CF");
  });

  it("builds from a validated table", () => {
    const catalog = CourseCatalog.fromTable({
      Math: { "Math 2101": { official: "Linear Algebra", colloquial: "Math" } },
    });

    expect(catalog.toTable()).toEqual({
      Math: { "Math 2101": { official: "Linear Algebra", colloquial: "Math" } },
    });
    expect(() => CourseCatalog.fromTable({ XYZ: {} })).toThrow(ParseError);
    expect(() => CourseCatalog.fromTable({ EEE: { "EEE 2100": { official: "x" } } })).toThrow(
      ParseError,
    );
  });
});
