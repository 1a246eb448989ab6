/**
 * Tests for config.ts — loadConfig + serviceConfigFrom.
 */

import { describe, it, expect } from "vitest";
import { loadConfig, serviceConfigFrom } from "../src/config.js";

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.TOKEN_NAME).toBe("Wrapped Rebasing USD");
    expect(config.TOKEN_SYMBOL).toBe("wRUSD");
    expect(config.CHAIN_ID).toBe(1);
    expect(config.TOKEN_ADDRESS).toBe("0x7777777777777777777777777777777777777777");
    expect(config.ASSET_ADDRESS).toBe("0x8888888888888888888888888888888888888888");
    expect(config.ADMIN_ADDRESS).toBe("0x9999999999999999999999999999999999999999");
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      CHAIN_ID: "11155111",
      TOKEN_SYMBOL: "wTEST",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.CHAIN_ID).toBe(11155111);
    expect(config.TOKEN_SYMBOL).toBe("wTEST");
  });

  it("checksums lower-case addresses", () => {
    const config = loadConfig({
      ADMIN_ADDRESS: "0xd8da6bf26964af9d7eed9e03e53415d37aa96045",
    });
    expect(config.ADMIN_ADDRESS).toBe("0xd8dA6BF26964aF9D7eEd9e03E53415D37aA96045");
  });

  it("throws on a malformed address", () => {
    expect(() => loadConfig({ TOKEN_ADDRESS: "0x1234" })).toThrow();
  });

  it("throws on invalid port", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ PORT: "70000" })).toThrow();
  });

  it("throws on invalid log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });
});

describe("serviceConfigFrom", () => {
  it("maps env fields onto the token, asset and admin", () => {
    const config = loadConfig({ TOKEN_NAME: "Wrapped Test", ASSET_SYMBOL: "TST" });
    expect(serviceConfigFrom(config)).toEqual({
      token: {
        name: "Wrapped Test",
        symbol: "wRUSD",
        chainId: 1,
        address: "0x7777777777777777777777777777777777777777",
      },
      asset: {
        address: "0x8888888888888888888888888888888888888888",
        name: "Rebasing USD",
        symbol: "TST",
      },
      admin: "0x9999999999999999999999999999999999999999",
    });
  });
});
