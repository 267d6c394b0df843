import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/domain/errors.js";
import {
  choiceOption,
  integerOption,
  numberOption,
  parseCommandArgs,
  type OptionSpec,
} from "../src/commands/args.js";
import { display, percent, renderTable } from "../src/commands/format.js";

const OPTIONS: OptionSpec[] = [
  { name: "genre", short: "g", type: "string", description: "Genre" },
  { name: "limit", short: "l", type: "string", description: "Limit" },
  { name: "fuzzy", short: "f", type: "boolean", description: "Fuzzy" },
];

describe("parseCommandArgs", () => {
  it("separates positionals, values and flags", () => {
    const parsed = parseCommandArgs(["dragon", "--genre=Fantasy", "-l", "5", "--fuzzy", "--", "--literal"], OPTIONS);

    expect(parsed.positionals).toEqual(["dragon", "--literal"]);
    expect(parsed.strings.get("genre")).toBe("Fantasy");
    expect(parsed.strings.get("limit")).toBe("5");
    expect(parsed.flags.has("fuzzy")).toBe(true);
  });

  it("rejects unknown options and missing values", () => {
    expect(() => parseCommandArgs(["--nope"], OPTIONS)).toThrow("Unknown option --nope");
    expect(() => parseCommandArgs(["--genre"], OPTIONS)).toThrow("Option --genre requires a value");
    expect(() => parseCommandArgs(["--fuzzy=yes"], OPTIONS)).toThrow("Option --fuzzy does not take a value");
  });

  it("converts typed options", () => {
    const parsed = parseCommandArgs(["--limit", "12", "--genre", "0.7"], OPTIONS);

    expect(integerOption(parsed, "limit")).toBe(12);
    expect(numberOption(parsed, "genre")).toBe(0.7);
    expect(integerOption(parsed, "missing")).toBeUndefined();
    expect(() => integerOption(parseCommandArgs(["-l", "x"], OPTIONS), "limit")).toThrow(ValidationError);
    expect(() => choiceOption(parsed, "genre", ["a", "b"])).toThrow("--genre must be one of a, b, got '0.7'");
  });
});

describe("format helpers", () => {
  it("pads table columns", () => {
    expect(renderTable(["ID", "Genre"], [["1", "Fantasy"], ["22", "Romance"]])).toEqual([
      "ID  Genre",
      "--  -------",
      "1   Fantasy",
      "22  Romance",
    ]);
  });

  it("renders missing values and percentages", () => {
    expect(display(null)).toBe("N/A");
    expect(display(["a", "b"])).toBe("a, b");
    expect(display("", "-")).toBe("-");
    expect(percent(0.856)).toBe("86%");
  });
});
