import { describe, it, expect } from "vitest";
import { summarizeMissingIndustry } from "@/supporters/diagnostics";
import { createSupporterRecord } from "@/supporters/extraction/supporterList";

describe("summarizeMissingIndustry", () => {
  const records = [
    createSupporterRecord({ name: "Alpha", link: "https://a.example.com" }),
    createSupporterRecord({ name: "Beta", industry: "Bau" }),
    createSupporterRecord({ name: "Gamma", logo: "https://example.org/g.png" }),
    createSupporterRecord({ name: "Delta", link: "https://d.example.com" }),
  ];

  it("should count records without industry and list their names", () => {
    expect(summarizeMissingIndustry(records, 10)).toEqual({
      count: 3,
      preview: ["Alpha", "Gamma", "Delta"],
    });
  });

  it("should cap the preview but not the count", () => {
    expect(summarizeMissingIndustry(records, 2)).toEqual({
      count: 3,
      preview: ["Alpha", "Gamma"],
    });
  });

  it("should report nothing when every record has an industry", () => {
    expect(summarizeMissingIndustry([records[1]], 10)).toEqual({
      count: 0,
      preview: [],
    });
  });
});
