import { describe, expect, it } from "vitest";

import { RATIONALE_FALLBACK, cleanResponse, interpretResponse, tidyRationale } from "../src/interpreter/interpreter.js";
import {
  firstLineRationale,
  markerResult,
  markerStrippedRationale,
  polarityResult,
  reasonFieldRationale,
  singleKeywordResult,
} from "../src/interpreter/strategies.js";

describe("interpretResponse", () => {
  it("drops tool echoes before reading the marker", () => {
    expect(interpretResponse("Tool #1: loading image...\n결과: false\n사유: 테두리 있음")).toEqual({
      result: false,
      rationale: "테두리 있음",
    });
  });

  it("reads the Korean result and reason fields", () => {
    expect(interpretResponse("결과: true\n사유: 브랜드 로고만 있음")).toEqual({
      result: true,
      rationale: "브랜드 로고만 있음",
    });
  });

  it("falls back to false and the original text when nothing is recognisable", () => {
    const text = "The photo shows a ceramic mug on a wooden table.";
    expect(interpretResponse(text)).toEqual({ result: false, rationale: text });
  });

  it("truncates an unstructured answer to 200 characters", () => {
    const text = "The background shows a wooden shelf with several items ".repeat(5);
    const interpretation = interpretResponse(text);

    expect(interpretation.result).toBe(false);
    expect(interpretation.rationale).toBe(text.trim().slice(0, 200).trim());
  });

  it("accepts markdown emphasis around the labels", () => {
    expect(interpretResponse("**Result:** FALSE\n**Reason:** a light blue frame surrounds the image")).toEqual({
      result: false,
      rationale: "a light blue frame surrounds the image",
    });
  });

  it("ignores thinking blocks and load-the-image preambles", () => {
    expect(
      interpretResponse("<thinking>maybe true</thinking>\nLet me load the image first.\nresult: false\nreason: red outline on the left edge"),
    ).toEqual({ result: false, rationale: "red outline on the left edge" });

    expect(interpretResponse("이미지를 분석하기 위해 먼저 파일을 불러오겠습니다.\n결과: true\n사유: 깔끔한 배경")).toEqual({
      result: true,
      rationale: "깔끔한 배경",
    });
  });

  it("removes verdict words from the rationale", () => {
    expect(interpretResponse("result: true\nreason: true, nothing but the brand logo")).toEqual({
      result: true,
      rationale: "nothing but the brand logo",
    });
  });

  it("returns the fallback for empty input", () => {
    expect(interpretResponse("")).toEqual({ result: false, rationale: RATIONALE_FALLBACK });
    expect(interpretResponse("  \n\t ")).toEqual({ result: false, rationale: RATIONALE_FALLBACK });
  });

  it("keeps an emoji whole when it falls on the truncation boundary", () => {
    const interpretation = interpretResponse(`${"a".repeat(199)}🙂 trailing words`);

    expect(interpretation.rationale).toBe(`${"a".repeat(199)}🙂`);
    expect(JSON.stringify(interpretation.rationale).endsWith('🙂"')).toBe(true);
  });

  it("never ends a truncated rationale on a lone surrogate", () => {
    const rationale = tidyRationale("🙂".repeat(250));

    expect(Array.from(rationale)).toHaveLength(200);
    expect(rationale).toBe("🙂".repeat(200));
  });

  it("is total over odd inputs", () => {
    const inputs = ["true false", "\u0000\u0001", "🙂🙂🙂", "결과:", "result: maybe", "x".repeat(5000), "::::"];
    for (const input of inputs) {
      const interpretation = interpretResponse(input);
      expect(typeof interpretation.result).toBe("boolean");
      expect(interpretation.rationale.length).toBeGreaterThan(0);
      expect(interpretation.rationale.length).toBeLessThanOrEqual(200);
    }
  });

  it("gives the same answer for already-cleaned text", () => {
    const samples = [
      "Tool #1: loading image...\n결과: false\n사유: 테두리 있음",
      "<thinking>x</thinking>  result:   true \n\n reason:  plain   studio backdrop",
      "The background is clean and meets the criteria.",
    ];
    for (const sample of samples) {
      const once = cleanResponse(sample);
      expect(cleanResponse(once)).toBe(once);
      expect(interpretResponse(once)).toEqual(interpretResponse(sample));
    }
  });
});

describe("cleanResponse", () => {
  it("collapses horizontal whitespace and keeps line breaks", () => {
    expect(cleanResponse("  result:\t true  \n\n\n  reason:   blue    frame ")).toBe("result: true\nreason: blue frame");
  });
});

describe("tidyRationale", () => {
  it("strips leading punctuation and falls back when nothing is left", () => {
    expect(tidyRationale("- : sale banner in the corner.")).toBe("sale banner in the corner.");
    expect(tidyRationale("false")).toBe(RATIONALE_FALLBACK);
  });
});

describe("result strategies", () => {
  it("marker reads an explicit verdict only", () => {
    expect(markerResult.extract("결과 : TRUE")).toBe(true);
    expect(markerResult.extract("result:false")).toBe(false);
    expect(markerResult.extract("no marker here, true")).toBeUndefined();
  });

  it("single-keyword needs exactly one of the two words", () => {
    expect(singleKeywordResult.extract("this looks true to me")).toBe(true);
    expect(singleKeywordResult.extract("It is false.")).toBe(false);
    expect(singleKeywordResult.extract("true or false")).toBeUndefined();
    expect(singleKeywordResult.extract("nothing decisive")).toBeUndefined();
  });

  it("polarity checks rejection vocabulary before acceptance", () => {
    expect(polarityResult.extract("inappropriate background")).toBe(false);
    expect(polarityResult.extract("the background is appropriate")).toBe(true);
    expect(polarityResult.extract("테두리가 있습니다")).toBe(false);
    expect(polarityResult.extract("문제없음")).toBe(true);
    expect(polarityResult.extract("a mug")).toBe(false);
  });
});

describe("rationale strategies", () => {
  it("reason-field takes the rest of the labelled line", () => {
    expect(reasonFieldRationale.extract("결과: false\n사유: 가격 문구 있음\n추가 설명")).toBe("가격 문구 있음");
    expect(reasonFieldRationale.extract("result: true")).toBeUndefined();
  });

  it("first-line skips result lines and short lines", () => {
    expect(firstLineRationale.extract("result: true\nshort\nplain white backdrop only")).toBe("plain white backdrop only");
    expect(firstLineRationale.extract("result: true\nok")).toBeUndefined();
  });

  it("marker-stripped keeps what surrounds the marker", () => {
    expect(markerStrippedRationale.extract("result: true ok fine")).toBe("ok fine");
    expect(markerStrippedRationale.extract("result: true")).toBeUndefined();
  });
});
