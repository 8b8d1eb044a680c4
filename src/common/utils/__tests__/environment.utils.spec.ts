import { EnvironmentUtils } from "@/common/utils/environment.utils";

describe("EnvironmentUtils", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
    jest.restoreAllMocks();
  });

  describe("parseInt", () => {
    it("should return the default when the variable is unset", () => {
      delete process.env.TEST_INT;
      expect(EnvironmentUtils.parseInt("TEST_INT", 42)).toBe(42);
    });

    it("should parse a valid integer", () => {
      process.env.TEST_INT = "8080";
      expect(EnvironmentUtils.parseInt("TEST_INT", 42)).toBe(8080);
    });

    it("should fall back and warn on a non-numeric value", () => {
      const warnSpy = jest.spyOn(console, "warn").mockImplementation();
      process.env.TEST_INT = "abc";

      expect(EnvironmentUtils.parseInt("TEST_INT", 42)).toBe(42);
      expect(warnSpy).toHaveBeenCalledWith('Invalid integer value "abc" for TEST_INT, using default 42');
    });

    it("should fall back when below the minimum", () => {
      const warnSpy = jest.spyOn(console, "warn").mockImplementation();
      process.env.TEST_INT = "0";

      expect(EnvironmentUtils.parseInt("TEST_INT", 10, { min: 1, fieldName: "Retries" })).toBe(10);
      expect(warnSpy).toHaveBeenCalledWith("Value 0 for Retries is below minimum 1, using default 10");
    });

    it("should fall back when above the maximum", () => {
      jest.spyOn(console, "warn").mockImplementation();
      process.env.TEST_INT = "70000";

      expect(EnvironmentUtils.parseInt("TEST_INT", 3101, { max: 65535 })).toBe(3101);
    });
  });

  describe("parseFloat", () => {
    it("should parse fractional values", () => {
      process.env.TEST_FLOAT = "2.5";
      expect(EnvironmentUtils.parseFloat("TEST_FLOAT", 10, { min: 0.5 })).toBe(2.5);
    });

    it("should fall back on garbage", () => {
      jest.spyOn(console, "warn").mockImplementation();
      process.env.TEST_FLOAT = "fast";
      expect(EnvironmentUtils.parseFloat("TEST_FLOAT", 10)).toBe(10);
    });
  });

  describe("parseBoolean", () => {
    it.each([
      ["true", true],
      ["1", true],
      ["YES", true],
      ["false", false],
      ["0", false],
      ["no", false],
    ])("should parse %s as %s", (value, expected) => {
      process.env.TEST_BOOL = value;
      expect(EnvironmentUtils.parseBoolean("TEST_BOOL", !expected)).toBe(expected);
    });

    it("should fall back on an unknown value", () => {
      const warnSpy = jest.spyOn(console, "warn").mockImplementation();
      process.env.TEST_BOOL = "maybe";

      expect(EnvironmentUtils.parseBoolean("TEST_BOOL", true)).toBe(true);
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("parseString", () => {
    it("should reject values that do not match the pattern", () => {
      jest.spyOn(console, "warn").mockImplementation();
      process.env.TEST_URL = "ftp://example.test";

      expect(EnvironmentUtils.parseString("TEST_URL", "https://default.test", { pattern: /^https?:\/\// })).toBe(
        "https://default.test"
      );
    });

    it("should return a matching value", () => {
      process.env.TEST_URL = "http://example.test";
      expect(EnvironmentUtils.parseString("TEST_URL", "https://default.test", { pattern: /^https?:\/\// })).toBe(
        "http://example.test"
      );
    });
  });

  describe("parseList", () => {
    it("should split on commas and drop blanks", () => {
      process.env.TEST_LIST = " binance, ,kraken,";
      expect(EnvironmentUtils.parseList("TEST_LIST")).toEqual(["binance", "kraken"]);
    });

    it("should return the default for an all-blank list", () => {
      process.env.TEST_LIST = " , ";
      expect(EnvironmentUtils.parseList("TEST_LIST", ["okx"])).toEqual(["okx"]);
    });
  });
});
