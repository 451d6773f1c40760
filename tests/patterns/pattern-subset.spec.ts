import { describe, expect, test } from "vitest";
import { UnsupportedPatternError } from "../../src/errors";
import {
	arePatternsEquivalent,
	compilePattern,
	isPatternCovered,
	isPatternSubset,
	isTrivialPattern,
	literalPattern,
	patternMatches,
	patternsOverlap,
	unionPattern,
} from "../../src/pattern-subset";

// ── Inclusion ──

describe("isPatternSubset", () => {
	test("fixed length ⊆ any length", () => {
		expect(isPatternSubset("^[a-z]{3}$", "^[a-z]+$")).toBe(true);
		expect(isPatternSubset("^[a-z]+$", "^[a-z]{3}$")).toBe(false);
	});

	test("search semantics", () => {
		expect(isPatternSubset("^abc", "b")).toBe(true);
		expect(isPatternSubset("b", "^abc")).toBe(false);
	});

	test("character classes", () => {
		expect(isPatternSubset("^\\d+$", "^[0-9a-f]+$")).toBe(true);
		expect(isPatternSubset("^[0-9a-f]+$", "^\\d+$")).toBe(false);
	});

	test("alternation", () => {
		expect(isPatternSubset("^(?:cat|dog)$", "^[a-z]{3}$")).toBe(true);
	});
});

describe("arePatternsEquivalent", () => {
	test("different sources, same language", () => {
		expect(arePatternsEquivalent("^a+$", "^aa*$")).toBe(true);
		expect(arePatternsEquivalent("^[ab]$", "^(?:a|b)$")).toBe(true);
	});

	test("different languages", () => {
		expect(arePatternsEquivalent("^a+$", "^a*$")).toBe(false);
	});
});

describe("isTrivialPattern", () => {
	test("accept everything", () => {
		expect(isTrivialPattern("")).toBe(true);
		expect(isTrivialPattern(".*")).toBe(true);
		expect(isTrivialPattern("[\\s\\S]*")).toBe(true);
	});

	test("line terminators are excluded by the dot", () => {
		expect(isTrivialPattern("^.*$")).toBe(false);
	});

	test("a literal is not trivial", () => {
		expect(isTrivialPattern("a")).toBe(false);
	});
});

describe("coverage and overlap", () => {
	test("union of patterns covers a class", () => {
		expect(isPatternCovered("^[a-c]$", ["^[ab]$", "^c$"])).toBe(true);
		expect(isPatternCovered("^[a-c]$", ["^a$"])).toBe(false);
	});

	test("overlap", () => {
		expect(patternsOverlap("^a", "b$")).toBe(true);
		expect(patternsOverlap("^a$", "^b$")).toBe(false);
	});
});

// ── Constructions ──

describe("unionPattern", () => {
	test("a subsumed side disappears", () => {
		expect(unionPattern("^a", "^ab")).toBe("^a");
	});

	test("incomparable sides", () => {
		const union = unionPattern("^a$", "^b$");
		expect(patternMatches(union, "a")).toBe(true);
		expect(patternMatches(union, "b")).toBe(true);
		expect(patternMatches(union, "ab")).toBe(false);
	});
});

describe("literalPattern", () => {
	test("escapes and anchors the values", () => {
		const pattern = literalPattern(["a.b", "c"]);
		expect(pattern).toBe("^(?:a\\.b|c)$");
		expect(patternMatches(pattern, "a.b")).toBe(true);
		expect(patternMatches(pattern, "axb")).toBe(false);
	});
});

describe("unsupported patterns", () => {
	test("lookahead", () => {
		expect(() => compilePattern("^(?=a)")).toThrow(UnsupportedPatternError);
	});

	test("backreference", () => {
		expect(() => compilePattern("(a)\\1")).toThrow(UnsupportedPatternError);
	});
});
