import { describe, expect, it } from "vitest";
import { classifyCommitMessage } from "./commit-classification.js";

describe("classifyCommitMessage", () => {
  it("classifies conventional commit prefixes", () => {
    expect(classifyCommitMessage("fix: handle empty payload")).toBe("fix");
    expect(classifyCommitMessage("feat(api): add pagination")).toBe("feat");
    expect(classifyCommitMessage("Refactor parser internals")).toBe("refactor");
    expect(classifyCommitMessage("docs: update readme")).toBe("other");
  });

  it("matches whole words only", () => {
    expect(classifyCommitMessage("prefix handling for paths")).toBe("other");
  });

  it("prefers fix over feat and refactor when several keywords appear", () => {
    expect(classifyCommitMessage("Add bugfix for login and cleanup")).toBe("fix");
    expect(classifyCommitMessage("implement cache, rename helpers")).toBe("feat");
  });

  it("uses custom keywords when given", () => {
    expect(
      classifyCommitMessage("chore: tidy imports", {
        fix: ["bug"],
        feat: ["feature"],
        refactor: ["tidy"],
      }),
    ).toBe("refactor");
  });
});
