import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../lib/versions.js", () => ({
  listVersions: vi.fn(),
}));

import { formatColumns, formatTime, listCommand, selectVersions } from "./list.js";
import { listVersions } from "../lib/versions.js";
import { StatusError } from "../lib/errors.js";
import type { VersionRecord } from "../types.js";

const record = (version: string, extra: Partial<VersionRecord> = {}): VersionRecord => ({
  version,
  retracted: false,
  ...extra,
});

describe("selectVersions", () => {
  const records = [
    record("v1.3.0", { retracted: true, retractionReason: "oops" }),
    record("v1.2.0"),
    record("v1.2.0-rc.1"),
    record("v1.1.0"),
    record("v1.0.0"),
  ];

  it("stops at the current version and hides retracted ones", () => {
    expect(selectVersions(records, "v1.1.0")).toEqual({
      versions: [record("v1.2.0"), record("v1.2.0-rc.1")],
      upToDate: false,
    });
  });

  it("lists everything with all", () => {
    expect(selectVersions(records, "v1.1.0", { all: true }).versions).toHaveLength(5);
  });

  it("filters on the pre-release part", () => {
    expect(
      selectVersions(records, "v1.1.0", { suffix: /rc/ }).versions.map((r) => r.version),
    ).toEqual(["v1.2.0-rc.1"]);
  });

  it("reports when nothing is newer", () => {
    expect(selectVersions(records, "v1.3.0")).toEqual({ versions: [], upToDate: true });
  });

  it("compares toolchain versions", () => {
    const toolchains = [record("go1.22.0"), record("go1.22rc1"), record("go1.21.0")];
    expect(
      selectVersions(toolchains, "go1.21.0", { suffix: /rc/ }).versions.map((r) => r.version),
    ).toEqual(["go1.22rc1"]);
  });
});

describe("formatTime", () => {
  it("formats in UTC to the minute", () => {
    expect(formatTime(new Date("2023-01-02T03:04:05Z"))).toBe("2023-01-02 03:04");
  });
});

describe("formatColumns", () => {
  it("pads every cell but the last of each row", () => {
    expect(
      formatColumns([
        ["v1.10.0", "2023-01-02 03:04", "retracted: bad"],
        ["v1.9.0", "2022-12-01 00:00"],
        ["v1.0.0"],
      ]),
    ).toEqual([
      "v1.10.0  2023-01-02 03:04  retracted: bad",
      "v1.9.0   2022-12-01 00:00",
      "v1.0.0",
    ]);
  });
});

describe("listCommand", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it("prints versions newer than the current one", async () => {
    vi.mocked(listVersions).mockResolvedValue([
      record("v1.2.0", { publishedAt: new Date("2023-03-01T12:30:00Z") }),
      record("v1.1.0", { publishedAt: new Date("2023-02-01T08:00:00Z") }),
    ]);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    await listCommand("example.com/m", { current: "v1.1.0" });

    expect(listVersions).toHaveBeenCalledWith(
      "example.com/m",
      "v1.1.0",
      expect.objectContaining({ includeAll: undefined }),
    );
    expect(logSpy.mock.calls.map(([line]) => String(line))).toEqual([
      "v1.2.0  2023-03-01 12:30",
    ]);
  });

  it("prints retraction details with --all", async () => {
    vi.mocked(listVersions).mockResolvedValue([
      record("v1.2.0", {
        publishedAt: new Date("2023-03-01T12:30:00Z"),
        retracted: true,
        retractionReason: "bad",
      }),
      record("v1.1.0", { publishedAt: new Date("2023-02-01T08:00:00Z") }),
    ]);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    await listCommand("example.com/m", { current: "v1.1.0", all: true });

    expect(listVersions).toHaveBeenCalledWith(
      "example.com/m",
      "v1.1.0",
      expect.objectContaining({ includeAll: true }),
    );
    expect(logSpy.mock.calls.map(([line]) => String(line))).toEqual([
      "v1.2.0  2023-03-01 12:30  retracted: bad",
      "v1.1.0  2023-02-01 08:00",
    ]);
  });

  it("says so when there is no new version", async () => {
    vi.mocked(listVersions).mockResolvedValue([record("v1.1.0")]);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    await listCommand("example.com/m", { current: "v1.1.0" });

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith("no new version");
  });

  it("prints JSON records", async () => {
    vi.mocked(listVersions).mockResolvedValue([
      record("v1.2.0", { publishedAt: new Date("2023-03-01T12:30:00Z") }),
    ]);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    await listCommand("example.com/m", { json: true });

    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual([
      { version: "v1.2.0", publishedAt: "2023-03-01T12:30:00.000Z", retracted: false },
    ]);
  });

  it("reports resolver failures and sets the exit code", async () => {
    vi.mocked(listVersions).mockRejectedValue(
      new StatusError("https://a.test/x", 503, "Service Unavailable"),
    );
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    await listCommand("example.com/m");

    expect(errorSpy).toHaveBeenCalledWith("✗ GET https://a.test/x: 503 Service Unavailable");
    expect(process.exitCode).toBe(1);
  });

  it("lets other errors through", async () => {
    vi.mocked(listVersions).mockRejectedValue(new Error("boom"));

    await expect(listCommand("example.com/m")).rejects.toThrow("boom");
  });
});
