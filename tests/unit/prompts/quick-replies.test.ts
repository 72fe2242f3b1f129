import { QuickReplies } from "../../../src/prompts/quick-replies";

const fixed = new QuickReplies({ now: () => new Date(2024, 2, 5, 9, 7), pick: () => 1 });

describe("QuickReplies", () => {
  it("answers greetings", () => {
    expect(fixed.match("Hey!")).toBe("Hi! What would you like to know?");
  });

  it("matches whole words only", () => {
    expect(fixed.match("this is a thing")).toBeNull();
    expect(fixed.match("Explain the word 'sometimes'")).toBeNull();
  });

  it("answers how-are-you and goodbyes", () => {
    expect(fixed.match("how are you today")).toBe("I'm doing well and ready to help! How are you?");
    expect(fixed.match("OK, goodbye")).toBe("Goodbye! Feel free to come back if you have more questions.");
  });

  it("reports the local time and date", () => {
    expect(fixed.match("What time is it?")).toBe("The current time is 09:07.");
    expect(fixed.match("what's the date")).toBe("Today's date is 2024-03-05.");
  });

  it("leaves anything else to the completion backends", () => {
    expect(fixed.match("What is the past tense of go?")).toBeNull();
    expect(fixed.match("   ")).toBeNull();
  });
});
