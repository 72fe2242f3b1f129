import { ReplayFilter, sanitizeFragment } from "../../../src/pipeline/sanitize";

describe("sanitizeFragment", () => {
  it("removes emoji and asterisks", () => {
    expect(sanitizeFragment("Great job! 🎉")).toBe("Great job! ");
    expect(sanitizeFragment("**bold** move")).toBe("bold move");
    expect(sanitizeFragment("✨")).toBe("");
  });

  it("leaves plain text alone", () => {
    expect(sanitizeFragment("What is a verb?")).toBe("What is a verb?");
  });
});

describe("ReplayFilter", () => {
  it("drops a long fragment already seen in the window", () => {
    const f = new ReplayFilter(1024, 12);
    expect(f.accept("The cat sat on the mat. ")).toBe(true);
    expect(f.accept("The cat sat on the mat. ")).toBe(false);
    expect(f.accept("Then it slept.")).toBe(true);
  });

  it("always passes short fragments", () => {
    const f = new ReplayFilter(1024, 12);
    expect(f.accept("the ")).toBe(true);
    expect(f.accept("the ")).toBe(true);
  });

  it("forgets text outside the window", () => {
    const f = new ReplayFilter(20, 12);
    expect(f.accept("repeated phrase")).toBe(true);
    expect(f.accept(" and then some more words")).toBe(true);
    expect(f.accept("repeated phrase")).toBe(true);
  });

  it("is disabled by a zero window", () => {
    const f = new ReplayFilter(0, 12);
    expect(f.accept("a long repeated fragment")).toBe(true);
    expect(f.accept("a long repeated fragment")).toBe(true);
  });

  it("rejects empty fragments", () => {
    expect(new ReplayFilter(1024, 12).accept("")).toBe(false);
  });
});
