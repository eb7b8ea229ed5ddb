import { strict as assert } from "assert";
import { formatElapsed } from "./elapsed";

describe("formatElapsed", () => {
  const start = 1_700_000_000_000;

  it("pads seconds under a minute", () => {
    assert.equal(formatElapsed(start, start + 7_000), "0:07");
  });

  it("formats minutes and seconds", () => {
    assert.equal(formatElapsed(start, start + 760_000), "12:40");
  });

  it("adds hours past sixty minutes", () => {
    assert.equal(formatElapsed(start, start + 3_729_000), "1:02:09");
  });

  it("never goes negative", () => {
    assert.equal(formatElapsed(start, start - 5_000), "0:00");
  });
});
