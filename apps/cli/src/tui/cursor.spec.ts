import { strict as assert } from "assert";
import { directionFor, moveCursor } from "./cursor.js";

const NO_ARROWS = { upArrow: false, downArrow: false, leftArrow: false, rightArrow: false };

describe("cursor", () => {
  it("moves one cell in each direction", () => {
    const at = { row: 4, col: 4 };
    assert.deepEqual(moveCursor(at, "up"), { row: 3, col: 4 });
    assert.deepEqual(moveCursor(at, "down"), { row: 5, col: 4 });
    assert.deepEqual(moveCursor(at, "left"), { row: 4, col: 3 });
    assert.deepEqual(moveCursor(at, "right"), { row: 4, col: 5 });
  });

  it("stops at the edges", () => {
    assert.deepEqual(moveCursor({ row: 0, col: 0 }, "up"), { row: 0, col: 0 });
    assert.deepEqual(moveCursor({ row: 0, col: 0 }, "left"), { row: 0, col: 0 });
    assert.deepEqual(moveCursor({ row: 8, col: 8 }, "down"), { row: 8, col: 8 });
    assert.deepEqual(moveCursor({ row: 8, col: 8 }, "right"), { row: 8, col: 8 });
  });

  it("maps arrows and hjkl to directions", () => {
    assert.equal(directionFor("", { ...NO_ARROWS, upArrow: true }), "up");
    assert.equal(directionFor("", { ...NO_ARROWS, rightArrow: true }), "right");
    assert.equal(directionFor("h", NO_ARROWS), "left");
    assert.equal(directionFor("j", NO_ARROWS), "down");
    assert.equal(directionFor("k", NO_ARROWS), "up");
    assert.equal(directionFor("l", NO_ARROWS), "right");
    assert.equal(directionFor("5", NO_ARROWS), null);
  });
});
