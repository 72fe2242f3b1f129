import { parseLessonCommand } from "../../src/main";

describe("parseLessonCommand", () => {
  it("reads all four fields", () => {
    expect(parseLessonCommand(" Past tense | Use -ed verbs | Sam | intermediate")).toEqual({
      lessonTitle: "Past tense",
      lessonObjective: "Use -ed verbs",
      studentName: "Sam",
      studentLevel: "intermediate",
    });
  });

  it("defaults the student and level", () => {
    expect(parseLessonCommand("Colours | Name five colours")).toEqual({
      lessonTitle: "Colours",
      lessonObjective: "Name five colours",
      studentName: "the student",
      studentLevel: "beginner",
    });
  });

  it("turns lesson mode off", () => {
    expect(parseLessonCommand(" off ")).toBeUndefined();
  });

  it("rejects a missing objective", () => {
    expect(parseLessonCommand("Colours")).toBe("invalid");
    expect(parseLessonCommand("")).toBe("invalid");
  });
});
