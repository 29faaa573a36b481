/**
 * Integration: supporters page fetch + extraction (offline, mocked HTTP)
 *
 * Uses the fixture listing under tests/fixtures/supporters
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { httpRequest, HttpError } from "@/clients/http";
import {
  extractSupporters,
  fetchSupportersPage,
  scanSupporterCandidates,
} from "@/supporters";
import { createMockHttp, loadFixtureText } from "../../helpers/mockHttp";

vi.mock("@/clients/http", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/clients/http")>();
  return { ...actual, httpRequest: vi.fn() };
});

const SOURCE_URL = "https://example.org/unterstuetzer";
const BASE_URL = "https://example.org";

const mockHttp = createMockHttp();
const mockedHttpRequest = vi.mocked(httpRequest);

describe("Integration: supporters page (offline, mocked HTTP)", () => {
  const fixtureHtml = loadFixtureText("supporters/supporters_page.html");

  beforeEach(() => {
    mockHttp.reset();
    mockedHttpRequest.mockReset();
    mockedHttpRequest.mockImplementation(mockHttp.request);
  });

  it("fetchSupportersPage sends one GET with user agent and timeout", async () => {
    mockHttp.on("GET", SOURCE_URL, fixtureHtml);

    const html = await fetchSupportersPage(SOURCE_URL);

    expect(html).toBe(fixtureHtml);
    expect(mockHttp.getRecordedRequests()).toEqual([
      {
        method: "GET",
        url: SOURCE_URL,
        headers: {
          "User-Agent": "Mozilla/5.0 (supporter-scraper; +github-actions)",
        },
        timeoutMs: 30_000,
      },
    ]);
  });

  it("fetchSupportersPage propagates HTTP errors unchanged", async () => {
    mockHttp.onResponse("GET", SOURCE_URL, { status: 503, body: "Wartung" });

    await expect(fetchSupportersPage(SOURCE_URL)).rejects.toMatchObject({
      name: "HttpError",
      status: 503,
    });
    await expect(fetchSupportersPage(SOURCE_URL)).rejects.toBeInstanceOf(HttpError);
  });

  it("extracts the fixture listing in alphabetical order", () => {
    const records = extractSupporters(fixtureHtml, { baseUrl: BASE_URL });

    expect(records.map((r) => r.name)).toEqual([
      "Ärztezentrum Nord",
      "Alpen Solar AG",
      "Bäckerei Huber",
      "Cafe Central",
      "Digital Werkstatt",
      "Energie Plus",
      "Fenster Meier",
      "Groß & Partner",
      "Hotel Sonnblick",
      "Müller & Co",
      "Öko Bau KG",
      "Zeta Logistik GmbH",
    ]);
  });

  it("extracts the fields of individual fixture entries", () => {
    const records = extractSupporters(fixtureHtml, { baseUrl: BASE_URL });
    const byName = new Map(records.map((r) => [r.name, r]));

    expect(byName.get("Zeta Logistik GmbH")).toEqual({
      name: "Zeta Logistik GmbH",
      industry: "Transport & Logistik",
      link: "https://zeta-logistik.example.com",
      logo: "https://example.org/media/logos/zeta.png",
      sortKey: "zeta logistik gmbh",
    });
    expect(byName.get("Bäckerei Huber")).toEqual({
      name: "Bäckerei Huber",
      industry: "Lebensmittel",
      link: "http://baeckerei-huber.example.at",
      logo: "https://cdn.example.net/huber.jpg",
      sortKey: "baeckerei huber",
    });
    expect(byName.get("Ärztezentrum Nord")).toEqual({
      name: "Ärztezentrum Nord",
      industry: "Gesundheit",
      logo: "https://example.org/media/logos/aerzte.png",
      sortKey: "aerztezentrum nord",
    });
    expect(byName.get("Alpen Solar AG")?.industry).toBeUndefined();
    expect(byName.get("Digital Werkstatt")?.industry).toBe("IT");
    expect(byName.get("Fenster Meier")?.link).toBe("https://fenster-meier.example.at");
    expect(byName.get("Hotel Sonnblick")?.industry).toBe("Tourismus");
  });

  it("reports why non-entry headings were dropped", () => {
    const candidates = scanSupporterCandidates(fixtureHtml, { baseUrl: BASE_URL });
    const rejected = candidates
      .filter((c) => c.status !== "accepted")
      .map((c) => [c.name, c.status]);

    expect(candidates).toHaveLength(16);
    expect(rejected).toEqual([
      ["Kontaktieren Sie uns wenn Sie Unterstützer werden wollen", "skipped-title"],
      ["Newsletter", "no-evidence"],
      ["Über Initiative Österreich 2040", "skipped-title"],
    ]);
  });

  it("orders records by non-decreasing sort key and is repeatable", () => {
    const first = extractSupporters(fixtureHtml, { baseUrl: BASE_URL });
    const second = extractSupporters(fixtureHtml, { baseUrl: BASE_URL });

    expect(second).toEqual(first);
    for (let i = 1; i < first.length; i++) {
      expect(first[i - 1].sortKey <= first[i].sortKey).toBe(true);
    }
  });
});
