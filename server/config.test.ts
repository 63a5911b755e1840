import { describe, expect, it } from "vitest";
import { ValidationError } from "../domain/errors.js";
import { loadServerConfig } from "./config.js";

describe("loadServerConfig", () => {
  it("defaults", () => {
    expect(loadServerConfig({})).toEqual({ port: 3000, host: "localhost" });
  });

  it("reads PORT and HOST", () => {
    expect(loadServerConfig({ PORT: "8080", HOST: "0.0.0.0" })).toEqual({ port: 8080, host: "0.0.0.0" });
  });

  it("blank values fall back to defaults", () => {
    expect(loadServerConfig({ PORT: " ", HOST: "" })).toEqual({ port: 3000, host: "localhost" });
  });

  it.each(["abc", "0", "65536", "80.5", "-1"])("rejects PORT=%s", (port) => {
    expect(() => loadServerConfig({ PORT: port })).toThrow(ValidationError);
  });
});
