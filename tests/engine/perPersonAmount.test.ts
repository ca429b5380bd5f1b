import { describe, it, expect } from "vitest";
import { perPersonAmount } from "../../src/engine/index.js";

describe("perPersonAmount", () => {
  it("should split an even amount evenly", () => {
    expect(perPersonAmount(3000, 3)).toBe(1000);
  });

  it("should round the equal share to the nearest cent", () => {
    expect(perPersonAmount(1000, 3)).toBe(333);
    expect(perPersonAmount(2000, 3)).toBe(667);
  });

  it("should give a single participant the whole amount", () => {
    expect(perPersonAmount(4250, 1)).toBe(4250);
  });

  it("should stay within half a cent per person of the total", () => {
    const share = perPersonAmount(10001, 7);
    expect(share).toBe(1429);
    expect(Math.abs(share * 7 - 10001)).toBeLessThanOrEqual(3.5);
  });

  it("should throw for zero participants", () => {
    expect(() => perPersonAmount(1000, 0)).toThrow("Cannot split among zero participants");
  });
});
