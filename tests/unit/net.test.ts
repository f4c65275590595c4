import { describe, it, expect } from "vitest";
import { parseListen } from "../../src/shared/net.js";
import { InvalidConfigurationError } from "../../src/shared/errors.js";

describe("parseListen", () => {
  it.each([
    ["", { host: "127.0.0.1", port: 4870 }],
    ["  ", { host: "127.0.0.1", port: 4870 }],
    ["8080", { host: "127.0.0.1", port: 8080 }],
    ["0.0.0.0:3000", { host: "0.0.0.0", port: 3000 }],
    ["localhost:4871", { host: "localhost", port: 4871 }],
    [":8080", { host: "127.0.0.1", port: 8080 }],
    ["[::1]:4870", { host: "::1", port: 4870 }],
    ["[::]:9000", { host: "::", port: 9000 }],
  ])("parses %j", (listen, expected) => {
    expect(parseListen(listen)).toEqual(expected);
  });

  it.each(["0", "99999", "127.0.0.1:bad", "127.0.0.1:", "127.0.0.1:80.5", "[::1]:70000"])(
    "rejects the port in %j",
    (listen) => {
      expect(() => parseListen(listen)).toThrow(`Invalid port in listen address "${listen}": must be 1-65535`);
    }
  );

  it.each(["localhost", "::1:4870", "[::1"])("rejects the malformed address %j", (listen) => {
    expect(() => parseListen(listen)).toThrow(InvalidConfigurationError);
    expect(() => parseListen(listen)).toThrow(/expected \[host:\]port/);
  });
});
