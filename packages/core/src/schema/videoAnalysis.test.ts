import { describe, it, expect } from "vitest";
import { zodToJsonSchema } from "zod-to-json-schema";
import { ValidationError } from "@watch-audit/shared";
import {
  VideoAnalysisRequestSchema,
  VideoAnalysisSchema,
  parseVideoAnalysis,
  raisedFlags,
  toProjection,
  type VideoAnalysis,
} from "./videoAnalysis.js";
import { MOCK_ANALYSIS } from "../services/mockModelClient.js";

function analysis(overrides: Partial<VideoAnalysis> = {}): VideoAnalysis {
  return { ...structuredClone(MOCK_ANALYSIS), ...overrides };
}

function expectValidationError(raw: string, code: string): ValidationError {
  try {
    parseVideoAnalysis(raw);
  } catch (error) {
    expect(error).toBeInstanceOf(ValidationError);
    const validation = error as ValidationError;
    expect(validation.code).toBe(code);
    return validation;
  }
  throw new Error("expected parseVideoAnalysis to throw");
}

describe("parseVideoAnalysis", () => {
  it("round-trips a valid analysis through JSON", () => {
    const value = analysis();
    expect(parseVideoAnalysis(JSON.stringify(value))).toEqual(value);
  });

  it("accepts output wrapped in a json code fence", () => {
    const raw = "```json\n" + JSON.stringify(analysis()) + "\n```";
    expect(parseVideoAnalysis(raw).verdict.action).toBe("Approve");
  });

  it("accepts a missing text_on_screen", () => {
    const value = analysis();
    delete value.visual_grounding.text_on_screen;
    expect(parseVideoAnalysis(JSON.stringify(value)).visual_grounding.text_on_screen).toBeUndefined();
  });

  it("rejects non-JSON text", () => {
    const error = expectValidationError("I cannot watch videos.", "INVALID_JSON");
    expect(error.message).toMatch(/^Response is not valid JSON: /);
  });

  it("rejects an unknown verdict action", () => {
    const raw = JSON.stringify({
      ...analysis(),
      verdict: { action: "Disapprove", reason: "no" },
    });
    const error = expectValidationError(raw, "SCHEMA_VIOLATION");
    expect(error.message).toContain("verdict.action");
  });

  it("rejects an out-of-range safety score instead of clamping", () => {
    const value = analysis();
    value.risk_assessment.safety_score = 101;
    const error = expectValidationError(JSON.stringify(value), "SCHEMA_VIOLATION");
    expect(error.message).toContain("risk_assessment.safety_score");
  });

  it("rejects a fractional safety score", () => {
    const value = analysis();
    value.risk_assessment.safety_score = 42.5;
    expectValidationError(JSON.stringify(value), "SCHEMA_VIOLATION");
  });

  it("rejects fewer than three detected entities", () => {
    const value = analysis();
    value.visual_grounding.detected_entities = ["one", "two"];
    const error = expectValidationError(JSON.stringify(value), "SCHEMA_VIOLATION");
    expect(error.message).toContain("visual_grounding.detected_entities");
  });

  it("rejects a missing section", () => {
    const { summary: _summary, ...rest } = analysis();
    const error = expectValidationError(JSON.stringify(rest), "SCHEMA_VIOLATION");
    expect(error.message).toContain("summary: Required");
  });

  it("drops keys outside the contract", () => {
    const parsed = parseVideoAnalysis(
      JSON.stringify({ ...analysis(), confidence: 0.9 }),
    );
    expect(parsed).not.toHaveProperty("confidence");
  });
});

describe("VideoAnalysisSchema", () => {
  it("accepts every rubric enum value it declares", () => {
    expect(VideoAnalysisSchema.shape.verdict.shape.action.options).toEqual([
      "Approve",
      "Monitor",
      "Block_Video",
      "Block_Channel",
    ]);
  });
});

describe("toProjection", () => {
  it("flattens the queryable scalars", () => {
    const value = analysis();
    value.video_metadata.format = "Short_Vertical";
    value.cognitive_nutrition.is_brainrot = true;
    value.content_taxonomy.primary_genre = "Gaming_Gameplay";
    value.risk_assessment.safety_score = 40;

    expect(toProjection(value)).toEqual({
      safetyScore: 40,
      primaryGenre: "Gaming_Gameplay",
      isSlop: false,
      isBrainrot: true,
      isShort: true,
    });
  });

  it("marks non-vertical formats as not short", () => {
    expect(toProjection(analysis()).isShort).toBe(false);
  });
});

describe("raisedFlags", () => {
  it("lists raised flags in rubric order", () => {
    const value = analysis();
    value.risk_assessment.flags.mascot_horror = true;
    value.risk_assessment.flags.lootbox_gambling = true;
    expect(raisedFlags(value)).toEqual(["lootbox_gambling", "mascot_horror"]);
  });

  it("returns an empty list when nothing is raised", () => {
    expect(raisedFlags(analysis())).toEqual([]);
  });
});

function typeLists(node: unknown, path = "$"): string[] {
  if (Array.isArray(node)) {
    return node.flatMap((child, i) => typeLists(child, `${path}[${i}]`));
  }
  if (typeof node !== "object" || node === null) return [];
  return Object.entries(node).flatMap(([key, value]) => {
    const here = `${path}.${key}`;
    const found = key === "type" && Array.isArray(value) ? [here] : [];
    return [...found, ...typeLists(value, here)];
  });
}

describe("VideoAnalysisRequestSchema", () => {
  it("converts to JSON Schema with a single type per property", () => {
    expect(typeLists(zodToJsonSchema(VideoAnalysisRequestSchema))).toEqual([]);
  });

  it("differs from the validation schema only in text_on_screen", () => {
    expect(typeLists(zodToJsonSchema(VideoAnalysisSchema))).toEqual([
      "$.properties.visual_grounding.properties.text_on_screen.type",
    ]);
  });

  it("leaves null text_on_screen valid for responses", () => {
    const value = analysis();
    value.visual_grounding.text_on_screen = null;
    expect(parseVideoAnalysis(JSON.stringify(value)).visual_grounding.text_on_screen).toBeNull();
  });
});
