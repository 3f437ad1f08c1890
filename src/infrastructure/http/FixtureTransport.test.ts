import { describe, it, expect, vi, beforeEach } from "vitest";
import * as fs from "fs";
import { FixtureTransport } from "./FixtureTransport.js";
import type { ILogger } from "../../domain/ports/ILogger.js";
import { createMockLogger } from "../../test-utils/fixtures.js";

// Mock fs module
vi.mock("fs", () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

describe("FixtureTransport", () => {
  let mockLogger: ILogger;
  let transport: FixtureTransport;

  beforeEach(() => {
    vi.clearAllMocks();
    mockLogger = createMockLogger();
    transport = new FixtureTransport("/fixtures", mockLogger);
  });

  it("should answer with the fixture named after the endpoint", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue('{"body":{"homes":[]},"status":"ok"}');

    const response = transport.post("homesdata");

    expect(fs.readFileSync).toHaveBeenCalledWith("/fixtures/homesdata.json", "utf-8");
    expect(response).toEqual({ status: 200, body: { body: { homes: [] }, status: "ok" } });
  });

  it("should use the last segment of an absolute url", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue("{}");

    transport.post("https://api.example.test/api/homestatus", { home_id: "home-1" });

    expect(fs.existsSync).toHaveBeenCalledWith("/fixtures/homestatus.json");
  });

  it("should answer 404 when no fixture exists", () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);

    const response = transport.post("setthermmode", { home_id: "home-1", mode: "away" });

    expect(response).toEqual({ status: 404, body: {} });
    expect(fs.readFileSync).not.toHaveBeenCalled();
    expect(mockLogger.warn).toHaveBeenCalledWith("No fixture for request", {
      url: "setthermmode",
      path: "/fixtures/setthermmode.json",
    });
  });
});
