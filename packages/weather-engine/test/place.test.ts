import { describe, expect, it } from "vitest";
import { normalizePlace } from "../src/place.js";

describe("normalizePlace", () => {
  it("removes whitespace runs and trailing punctuation", () => {
    expect(normalizePlace("北京市 朝阳区，")).toBe("北京市朝阳区");
    expect(normalizePlace("  杭州\t西湖区 。")).toBe("杭州西湖区");
  });

  it("strips one trailing possessive character", () => {
    expect(normalizePlace("上海的")).toBe("上海");
    expect(normalizePlace("上海的的")).toBe("上海的");
  });

  it("strips punctuation before the possessive", () => {
    expect(normalizePlace("广州的？")).toBe("广州");
    expect(normalizePlace("深圳;；:,.")).toBe("深圳");
  });

  it("keeps punctuation that is not trailing", () => {
    expect(normalizePlace("香港,九龙")).toBe("香港,九龙");
  });

  it("reduces blank input to an empty string", () => {
    expect(normalizePlace(" 　 ，")).toBe("");
  });
});
