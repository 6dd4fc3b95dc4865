import { getEnvBoolean, getEnvNumber } from "../env";

describe("getEnvBoolean", () => {
  const ORIGINAL_ENV = { ...process.env };

  afterEach(() => {
    process.env = { ...ORIGINAL_ENV };
  });

  it("returns default when unset", () => {
    delete process.env.RELAY_TEST_FLAG;
    expect(getEnvBoolean("RELAY_TEST_FLAG", false)).toBe(false);
    expect(getEnvBoolean("RELAY_TEST_FLAG", true)).toBe(true);
  });

  it("treats truthy strings as true", () => {
    ["1", "true", "yes", "on", " TRUE  "].forEach((v) => {
      process.env.RELAY_TEST_FLAG = v;
      expect(getEnvBoolean("RELAY_TEST_FLAG", false)).toBe(true);
    });
  });

  it("treats falsy strings as false", () => {
    ["0", "false", "no", "off", " False "].forEach((v) => {
      process.env.RELAY_TEST_FLAG = v;
      expect(getEnvBoolean("RELAY_TEST_FLAG", true)).toBe(false);
    });
  });
});

describe("getEnvNumber", () => {
  const ORIGINAL_ENV = { ...process.env };

  afterEach(() => {
    process.env = { ...ORIGINAL_ENV };
    jest.restoreAllMocks();
  });

  it("reads numbers and falls back when unset or blank", () => {
    delete process.env.RELAY_TEST_MS;
    expect(getEnvNumber("RELAY_TEST_MS", 500)).toBe(500);
    process.env.RELAY_TEST_MS = " ";
    expect(getEnvNumber("RELAY_TEST_MS", 500)).toBe(500);
    process.env.RELAY_TEST_MS = "1500";
    expect(getEnvNumber("RELAY_TEST_MS", 500)).toBe(1500);
    process.env.RELAY_TEST_MS = "0";
    expect(getEnvNumber("RELAY_TEST_MS", 500)).toBe(0);
  });

  it("warns and falls back on malformed values", () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => {});
    ["soon", "-1", "Infinity"].forEach((v) => {
      process.env.RELAY_TEST_MS = v;
      expect(getEnvNumber("RELAY_TEST_MS", 500)).toBe(500);
    });
    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenCalledWith("[config] ignoring RELAY_TEST_MS=soon; using 500");
  });
});
