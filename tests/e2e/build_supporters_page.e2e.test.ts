/**
 * E2E: fetch → extract → guard → render → write (offline, mocked HTTP)
 *
 * Output goes to a fresh temp directory per test.
 */

import { mkdtempSync, readFileSync, rmSync, existsSync, mkdirSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { BuildConfig } from "@/types";
import { httpRequest, HttpError } from "@/clients/http";
import { buildSupportersPage, ExtractionGuardError } from "@/orchestration";
import { extractSupporters } from "@/supporters";
import { renderSupportersPage } from "@/render";
import { createMockHttp, loadFixtureText } from "../helpers/mockHttp";

vi.mock("@/clients/http", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/clients/http")>();
  return { ...actual, httpRequest: vi.fn() };
});

const SOURCE_URL = "https://example.org/unterstuetzer";
const BASE_URL = "https://example.org";

const mockHttp = createMockHttp();
const mockedHttpRequest = vi.mocked(httpRequest);

describe("E2E: buildSupportersPage", () => {
  const fixtureHtml = loadFixtureText("supporters/supporters_page.html");
  let workDir: string;
  let config: BuildConfig;

  beforeEach(() => {
    mockHttp.reset();
    mockedHttpRequest.mockReset();
    mockedHttpRequest.mockImplementation(mockHttp.request);

    workDir = mkdtempSync(join(tmpdir(), "supporters-"));
    config = {
      sourceUrl: SOURCE_URL,
      baseUrl: BASE_URL,
      outputFile: join(workDir, "dist", "index.html"),
      minEntries: 10,
    };
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it("writes the rendered page for a healthy listing", async () => {
    mockHttp.on("GET", SOURCE_URL, fixtureHtml);

    const result = await buildSupportersPage(config);

    expect(result).toEqual({
      outputFile: config.outputFile,
      entryCount: 12,
      missingIndustry: 1,
    });

    const written = readFileSync(config.outputFile, "utf-8");
    const expected = renderSupportersPage(
      extractSupporters(fixtureHtml, { baseUrl: BASE_URL }),
    );
    expect(written).toBe(expected);
    expect(written).toContain("Partner: <strong>12</strong>");
  });

  it("produces byte-identical output on repeated runs", async () => {
    mockHttp.on("GET", SOURCE_URL, fixtureHtml);

    await buildSupportersPage(config);
    const first = readFileSync(config.outputFile, "utf-8");
    await buildSupportersPage(config);
    const second = readFileSync(config.outputFile, "utf-8");

    expect(second).toBe(first);
  });

  it("aborts without writing when too few supporters are found", async () => {
    mockHttp.on("GET", SOURCE_URL, fixtureHtml);

    const failure = buildSupportersPage({ ...config, minEntries: 13 });

    await expect(failure).rejects.toBeInstanceOf(ExtractionGuardError);
    await expect(failure).rejects.toMatchObject({ entryCount: 12, minEntries: 13 });
    expect(existsSync(config.outputFile)).toBe(false);
  });

  it("leaves the previous page untouched when the guard trips", async () => {
    const smallListing = `
      <img src="/a.png"><h3>Acme GmbH</h3><p>Branche: Bau</p>
      <img src="/b.png"><h3>Beta AG</h3><p>Branche: IT</p>
    `;
    mockHttp.on("GET", SOURCE_URL, smallListing);
    mkdirSync(join(workDir, "dist"), { recursive: true });
    writeFileSync(config.outputFile, "previous page", "utf-8");

    await expect(buildSupportersPage(config)).rejects.toMatchObject({
      name: "ExtractionGuardError",
      entryCount: 2,
      minEntries: 10,
    });
    expect(readFileSync(config.outputFile, "utf-8")).toBe("previous page");
  });

  it("propagates fetch failures without writing", async () => {
    mockHttp.onResponse("GET", SOURCE_URL, { status: 500, body: "" });

    await expect(buildSupportersPage(config)).rejects.toBeInstanceOf(HttpError);
    expect(existsSync(config.outputFile)).toBe(false);
  });

  it("propagates transport errors without writing", async () => {
    mockHttp.onCustom("GET", SOURCE_URL, async () => {
      throw new TypeError("fetch failed");
    });

    await expect(buildSupportersPage(config)).rejects.toThrow("fetch failed");
    expect(existsSync(config.outputFile)).toBe(false);
  });
});
