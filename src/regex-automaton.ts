import { UnsupportedPatternError } from "./errors";
import type { Interval } from "./interval";

// ─── Regex Automata ──────────────────────────────────────────────────────────
//
// Compilation des patterns ECMA-262 (sous-ensemble régulier) en automates
// finis déterministes sur les unités de code UTF-16.
//
//   pattern ──parse──▶ AST ──Thompson──▶ NFA ──sous-ensembles──▶ DFA
//
// Sémantique JSON Schema : `pattern` est une RECHERCHE (non ancrée). Une
// branche sans `^` reçoit un préfixe Σ*, une branche sans `$` un suffixe Σ*.
//
// Non supporté (→ UnsupportedPatternError) : lookarounds, backreferences,
// \b / \B, ancres à l'intérieur d'une branche, \p{…}, flags.
//
// Les transitions DFA sont des intervalles disjoints triés : une classe
// [a-z] est UNE arête, pas 26.

export interface CharRange {
	from: number;
	to: number;
}

export interface DfaEdge {
	from: number;
	to: number;
	target: number;
}

export interface DfaState {
	accepting: boolean;
	/** Intervalles disjoints, triés par `from` */
	edges: DfaEdge[];
}

/** DFA dont tous les états sont accessibles depuis `states[0]`. */
export interface Dfa {
	states: DfaState[];
}

export const MAX_CODE_UNIT = 0xffff;

const MAX_NFA_STATES = 20_000;
const MAX_DFA_STATES = 4_096;
const MAX_PRODUCT_STATES = 20_000;

const FULL_RANGE: CharRange[] = [{ from: 0, to: MAX_CODE_UNIT }];

// ─── Character sets ──────────────────────────────────────────────────────────

function normalizeRanges(ranges: readonly CharRange[]): CharRange[] {
	const sorted = [...ranges].sort((a, b) => a.from - b.from);
	const merged: CharRange[] = [];
	for (const range of sorted) {
		const last = merged[merged.length - 1];
		if (last && range.from <= last.to + 1) {
			last.to = Math.max(last.to, range.to);
		} else {
			merged.push({ from: range.from, to: range.to });
		}
	}
	return merged;
}

function complementRanges(ranges: readonly CharRange[]): CharRange[] {
	const result: CharRange[] = [];
	let next = 0;
	for (const range of normalizeRanges(ranges)) {
		if (range.from > next) result.push({ from: next, to: range.from - 1 });
		next = range.to + 1;
	}
	if (next <= MAX_CODE_UNIT) result.push({ from: next, to: MAX_CODE_UNIT });
	return result;
}

function single(code: number): CharRange[] {
	return [{ from: code, to: code }];
}

const DIGIT: CharRange[] = [{ from: 0x30, to: 0x39 }];

const WORD: CharRange[] = [
	{ from: 0x30, to: 0x39 },
	{ from: 0x41, to: 0x5a },
	{ from: 0x5f, to: 0x5f },
	{ from: 0x61, to: 0x7a },
];

const SPACE: CharRange[] = normalizeRanges([
	{ from: 0x09, to: 0x0d },
	{ from: 0x20, to: 0x20 },
	{ from: 0xa0, to: 0xa0 },
	{ from: 0x1680, to: 0x1680 },
	{ from: 0x2000, to: 0x200a },
	{ from: 0x2028, to: 0x2029 },
	{ from: 0x202f, to: 0x202f },
	{ from: 0x205f, to: 0x205f },
	{ from: 0x3000, to: 0x3000 },
	{ from: 0xfeff, to: 0xfeff },
]);

// `.` exclut les terminateurs de ligne
const DOT: CharRange[] = complementRanges([
	{ from: 0x0a, to: 0x0a },
	{ from: 0x0d, to: 0x0d },
	{ from: 0x2028, to: 0x2029 },
]);

// ─── AST ─────────────────────────────────────────────────────────────────────

type RegexNode =
	| { kind: "empty" }
	| { kind: "charClass"; ranges: CharRange[] }
	| { kind: "concat"; items: RegexNode[] }
	| { kind: "alt"; options: RegexNode[] }
	| { kind: "repeat"; child: RegexNode; min: number; max: number | null }
	| { kind: "anchor"; side: "start" | "end" };

class RegexSyntaxError extends Error {}

function unsupported(reason: string): never {
	throw new RegexSyntaxError(reason);
}

class RegexParser {
	private pos = 0;

	constructor(private readonly source: string) {}

	parse(): RegexNode {
		const node = this.parseAlternation();
		if (!this.isAtEnd()) unsupported("unbalanced parenthesis");
		return node;
	}

	private parseAlternation(): RegexNode {
		const options = [this.parseConcatenation()];
		while (!this.isAtEnd() && this.peek() === "|") {
			this.pos++;
			options.push(this.parseConcatenation());
		}
		const [first] = options;
		return options.length === 1 && first ? first : { kind: "alt", options };
	}

	private parseConcatenation(): RegexNode {
		const items: RegexNode[] = [];
		while (!this.isAtEnd() && this.peek() !== "|" && this.peek() !== ")") {
			items.push(this.parseRepetition());
		}
		const [first] = items;
		if (items.length === 0) return { kind: "empty" };
		return items.length === 1 && first ? first : { kind: "concat", items };
	}

	private parseRepetition(): RegexNode {
		const atom = this.parseAtom();
		if (this.isAtEnd()) return atom;

		const ch = this.peek();
		let min: number;
		let max: number | null;
		if (ch === "*") {
			this.pos++;
			[min, max] = [0, null];
		} else if (ch === "+") {
			this.pos++;
			[min, max] = [1, null];
		} else if (ch === "?") {
			this.pos++;
			[min, max] = [0, 1];
		} else {
			const braces = this.readBraces();
			if (!braces) return atom;
			[min, max] = braces;
		}
		if (atom.kind === "anchor") unsupported("quantified anchor");
		// lazy quantifiers accept the same language
		if (!this.isAtEnd() && this.peek() === "?") this.pos++;
		if (!this.isAtEnd() && "*+?".includes(this.peek())) {
			unsupported("nothing to repeat");
		}
		return { kind: "repeat", child: atom, min, max };
	}

	/** `{n}`, `{n,}`, `{n,m}` ; sinon `{` est un littéral. */
	private readBraces(): [number, number | null] | undefined {
		const match = /^\{(\d+)(,(\d*))?\}/.exec(this.source.slice(this.pos));
		if (!match) return undefined;
		const [whole, minText, comma, maxText] = match;
		const min = Number(minText);
		let max: number | null = min;
		if (comma !== undefined) {
			max = maxText ? Number(maxText) : null;
		}
		if (max !== null && max < min) unsupported("quantifier range out of order");
		this.pos += whole.length;
		return [min, max];
	}

	private parseAtom(): RegexNode {
		const ch = this.next();
		switch (ch) {
			case "(":
				return this.parseGroup();
			case "[":
				return { kind: "charClass", ranges: this.parseClass() };
			case ".":
				return { kind: "charClass", ranges: DOT };
			case "^":
				return { kind: "anchor", side: "start" };
			case "$":
				return { kind: "anchor", side: "end" };
			case "\\":
				return { kind: "charClass", ranges: this.parseEscape(false) };
			case "*":
			case "+":
			case "?":
				return unsupported("nothing to repeat");
			case "{":
				this.pos--;
				if (this.readBraces()) unsupported("nothing to repeat");
				this.pos++;
				return { kind: "charClass", ranges: single(0x7b) };
			default:
				return { kind: "charClass", ranges: single(ch.charCodeAt(0)) };
		}
	}

	private parseGroup(): RegexNode {
		if (this.source.startsWith("?:", this.pos)) {
			this.pos += 2;
		} else if (
			this.source.startsWith("?=", this.pos) ||
			this.source.startsWith("?!", this.pos) ||
			this.source.startsWith("?<=", this.pos) ||
			this.source.startsWith("?<!", this.pos)
		) {
			unsupported("lookaround assertion");
		} else if (this.source.startsWith("?<", this.pos)) {
			const close = this.source.indexOf(">", this.pos);
			if (close < 0) unsupported("unterminated group name");
			this.pos = close + 1;
		} else if (!this.isAtEnd() && this.peek() === "?") {
			unsupported("group modifier");
		}
		const inner = this.parseAlternation();
		if (this.isAtEnd() || this.next() !== ")") {
			unsupported("unbalanced parenthesis");
		}
		return inner;
	}

	private parseClass(): CharRange[] {
		let negated = false;
		if (!this.isAtEnd() && this.peek() === "^") {
			negated = true;
			this.pos++;
		}
		const ranges: CharRange[] = [];
		for (;;) {
			if (this.isAtEnd()) unsupported("unterminated character class");
			if (this.peek() === "]") {
				this.pos++;
				break;
			}
			const start = this.parseClassAtom();
			if (
				this.peek() === "-" &&
				this.source[this.pos + 1] !== undefined &&
				this.source[this.pos + 1] !== "]"
			) {
				this.pos++;
				const end = this.parseClassAtom();
				const [low] = start;
				const [high] = end;
				if (start.length === 1 && end.length === 1 && low && high) {
					if (low.from !== low.to || high.from !== high.to) {
						// class escape on one side: '-' is a literal
						ranges.push(...start, ...single(0x2d), ...end);
					} else if (low.from > high.from) {
						unsupported("character class range out of order");
					} else {
						ranges.push({ from: low.from, to: high.from });
					}
				} else {
					ranges.push(...start, ...single(0x2d), ...end);
				}
				continue;
			}
			ranges.push(...start);
		}
		const set = normalizeRanges(ranges);
		return negated ? complementRanges(set) : set;
	}

	private parseClassAtom(): CharRange[] {
		const ch = this.next();
		if (ch === "\\") return this.parseEscape(true);
		return single(ch.charCodeAt(0));
	}

	private parseEscape(inClass: boolean): CharRange[] {
		if (this.isAtEnd()) unsupported("dangling escape");
		const ch = this.next();
		switch (ch) {
			case "d":
				return DIGIT;
			case "D":
				return complementRanges(DIGIT);
			case "w":
				return WORD;
			case "W":
				return complementRanges(WORD);
			case "s":
				return SPACE;
			case "S":
				return complementRanges(SPACE);
			case "t":
				return single(0x09);
			case "n":
				return single(0x0a);
			case "v":
				return single(0x0b);
			case "f":
				return single(0x0c);
			case "r":
				return single(0x0d);
			case "b":
				if (inClass) return single(0x08);
				return unsupported("word boundary assertion");
			case "B":
				return unsupported("word boundary assertion");
			case "p":
			case "P":
				return unsupported("unicode property escape");
			case "k":
				return unsupported("named backreference");
			case "0":
				if (/\d/.test(this.peekOr(""))) unsupported("octal escape");
				return single(0);
			case "x":
				return this.readHex(2) ?? single(0x78);
			case "u":
				return this.readHex(4) ?? single(0x75);
			case "c": {
				const letter = this.peekOr("");
				if (/[A-Za-z]/.test(letter)) {
					this.pos++;
					return single(letter.charCodeAt(0) % 32);
				}
				return unsupported("invalid control escape");
			}
			default:
				if (/[1-9]/.test(ch)) unsupported("backreference");
				return single(ch.charCodeAt(0));
		}
	}

	private readHex(digits: number): CharRange[] | undefined {
		const text = this.source.slice(this.pos, this.pos + digits);
		if (text.length !== digits || !/^[0-9a-fA-F]+$/.test(text)) {
			return undefined;
		}
		this.pos += digits;
		return single(Number.parseInt(text, 16));
	}

	private isAtEnd(): boolean {
		return this.pos >= this.source.length;
	}

	private peek(): string {
		return this.peekOr("");
	}

	private peekOr(fallback: string): string {
		return this.source[this.pos] ?? fallback;
	}

	private next(): string {
		const ch = this.source[this.pos];
		if (ch === undefined) return unsupported("unexpected end of pattern");
		this.pos++;
		return ch;
	}
}

// ─── Branch analysis ─────────────────────────────────────────────────────────

interface SearchBranch {
	anchoredStart: boolean;
	anchoredEnd: boolean;
	body: RegexNode;
}

function containsAnchor(node: RegexNode): boolean {
	switch (node.kind) {
		case "anchor":
			return true;
		case "concat":
			return node.items.some(containsAnchor);
		case "alt":
			return node.options.some(containsAnchor);
		case "repeat":
			return containsAnchor(node.child);
		default:
			return false;
	}
}

function toBranches(ast: RegexNode): SearchBranch[] {
	const options = ast.kind === "alt" ? ast.options : [ast];
	return options.map((option) => {
		const items = option.kind === "concat" ? [...option.items] : [option];
		let anchoredStart = false;
		let anchoredEnd = false;
		for (
			let first = items[0];
			first?.kind === "anchor" && first.side === "start";
			first = items[0]
		) {
			items.shift();
			anchoredStart = true;
		}
		for (;;) {
			const last = items[items.length - 1];
			if (last?.kind !== "anchor" || last.side !== "end") break;
			items.pop();
			anchoredEnd = true;
		}
		const body: RegexNode =
			items.length === 0
				? { kind: "empty" }
				: items.length === 1 && items[0]
					? items[0]
					: { kind: "concat", items };
		if (containsAnchor(body)) unsupported("anchor inside expression");
		return { anchoredStart, anchoredEnd, body };
	});
}

const ANY_STRING: RegexNode = {
	kind: "repeat",
	child: { kind: "charClass", ranges: FULL_RANGE },
	min: 0,
	max: null,
};

/** Corps plein-match de chaque branche, Σ* compris. */
function fullMatchBranches(ast: RegexNode): RegexNode[] {
	return toBranches(ast).map((branch) => {
		const items: RegexNode[] = [];
		if (!branch.anchoredStart) items.push(ANY_STRING);
		if (branch.body.kind !== "empty") items.push(branch.body);
		if (!branch.anchoredEnd) items.push(ANY_STRING);
		const [first] = items;
		if (items.length === 0) return { kind: "empty" };
		return items.length === 1 && first ? first : { kind: "concat", items };
	});
}

function parseSource(source: string): RegexNode {
	try {
		new RegExp(source);
	} catch (error) {
		throw new UnsupportedPatternError(
			source,
			error instanceof Error ? error.message : "invalid regular expression",
		);
	}
	try {
		return new RegexParser(source).parse();
	} catch (error) {
		if (error instanceof RegexSyntaxError) {
			throw new UnsupportedPatternError(source, error.message);
		}
		throw error;
	}
}

// ─── Thompson NFA ────────────────────────────────────────────────────────────

interface NfaState {
	epsilon: number[];
	edges: { range: CharRange; to: number }[];
}

interface NfaFragment {
	start: number;
	accept: number;
}

class ThompsonBuilder {
	readonly states: NfaState[] = [];

	newState(): number {
		if (this.states.length >= MAX_NFA_STATES) {
			unsupported("pattern is too complex");
		}
		this.states.push({ epsilon: [], edges: [] });
		return this.states.length - 1;
	}

	private epsilon(from: number, to: number): void {
		this.states[from]?.epsilon.push(to);
	}

	build(node: RegexNode): NfaFragment {
		switch (node.kind) {
			case "empty":
			case "anchor": {
				const start = this.newState();
				const accept = this.newState();
				this.epsilon(start, accept);
				return { start, accept };
			}
			case "charClass": {
				const start = this.newState();
				const accept = this.newState();
				const state = this.states[start];
				for (const range of node.ranges) {
					state?.edges.push({ range, to: accept });
				}
				return { start, accept };
			}
			case "concat": {
				const fragments = node.items.map((item) => this.build(item));
				return this.chain(fragments);
			}
			case "alt": {
				const start = this.newState();
				const accept = this.newState();
				for (const option of node.options) {
					const fragment = this.build(option);
					this.epsilon(start, fragment.start);
					this.epsilon(fragment.accept, accept);
				}
				return { start, accept };
			}
			case "repeat":
				return this.buildRepeat(node.child, node.min, node.max);
		}
	}

	private chain(fragments: NfaFragment[]): NfaFragment {
		const [first] = fragments;
		if (!first) return this.build({ kind: "empty" });
		let current = first;
		for (const fragment of fragments.slice(1)) {
			this.epsilon(current.accept, fragment.start);
			current = { start: current.start, accept: fragment.accept };
		}
		return { start: first.start, accept: current.accept };
	}

	private buildRepeat(
		child: RegexNode,
		min: number,
		max: number | null,
	): NfaFragment {
		const fragments: NfaFragment[] = [];
		for (let i = 0; i < min; i++) fragments.push(this.build(child));

		if (max === null) {
			const start = this.newState();
			const accept = this.newState();
			const inner = this.build(child);
			this.epsilon(start, inner.start);
			this.epsilon(start, accept);
			this.epsilon(inner.accept, inner.start);
			this.epsilon(inner.accept, accept);
			fragments.push({ start, accept });
		} else {
			for (let i = min; i < max; i++) {
				const start = this.newState();
				const accept = this.newState();
				const inner = this.build(child);
				this.epsilon(start, inner.start);
				this.epsilon(start, accept);
				this.epsilon(inner.accept, accept);
				fragments.push({ start, accept });
			}
		}
		return this.chain(fragments);
	}
}

// ─── Subset construction ─────────────────────────────────────────────────────

function epsilonClosure(states: NfaState[], seed: Iterable<number>): number[] {
	const result = new Set(seed);
	const stack = Array.from(result);
	for (let id = stack.pop(); id !== undefined; id = stack.pop()) {
		for (const next of states[id]?.epsilon ?? []) {
			if (!result.has(next)) {
				result.add(next);
				stack.push(next);
			}
		}
	}
	return Array.from(result).sort((a, b) => a - b);
}

/** Fusionne les arêtes adjacentes de même cible. */
function compactEdges(edges: DfaEdge[]): DfaEdge[] {
	const result: DfaEdge[] = [];
	for (const edge of edges) {
		const last = result[result.length - 1];
		if (last && last.target === edge.target && last.to + 1 === edge.from) {
			last.to = edge.to;
		} else {
			result.push({ ...edge });
		}
	}
	return result;
}

function determinize(nfa: NfaState[], start: number, accept: number): Dfa {
	const states: DfaState[] = [];
	const ids = new Map<string, number>();
	const queue: number[][] = [];

	const intern = (set: number[]): number => {
		const key = set.join(",");
		const known = ids.get(key);
		if (known !== undefined) return known;
		if (states.length >= MAX_DFA_STATES) unsupported("pattern is too complex");
		const id = states.length;
		ids.set(key, id);
		states.push({ accepting: set.includes(accept), edges: [] });
		queue.push(set);
		return id;
	};

	intern(epsilonClosure(nfa, [start]));
	for (let index = 0; index < queue.length; index++) {
		const set = queue[index] ?? [];
		const edges = set.flatMap((id) => nfa[id]?.edges ?? []);
		const cuts = new Set<number>();
		for (const { range } of edges) {
			cuts.add(range.from);
			cuts.add(range.to + 1);
		}
		const bounds = Array.from(cuts).sort((a, b) => a - b);
		const out: DfaEdge[] = [];
		for (let i = 0; i + 1 < bounds.length; i++) {
			const from = bounds[i] ?? 0;
			const to = (bounds[i + 1] ?? 0) - 1;
			const targets = edges
				.filter(({ range }) => range.from <= from && from <= range.to)
				.map((edge) => edge.to);
			if (targets.length === 0) continue;
			out.push({ from, to, target: intern(epsilonClosure(nfa, targets)) });
		}
		const state = states[index];
		if (state) state.edges = compactEdges(out);
	}
	return { states };
}

function compileNode(node: RegexNode): Dfa {
	const builder = new ThompsonBuilder();
	const fragment = builder.build(node);
	return determinize(builder.states, fragment.start, fragment.accept);
}

// ─── Public compilation API ──────────────────────────────────────────────────

/**
 * Compile un pattern JSON Schema (sémantique de recherche) en DFA.
 *
 * @throws UnsupportedPatternError si le pattern sort du sous-ensemble régulier
 */
export function compileSearchPattern(source: string): Dfa {
	const ast = parseSource(source);
	try {
		const branches = fullMatchBranches(ast);
		const [first] = branches;
		return compileNode(
			branches.length === 1 && first ? first : { kind: "alt", options: branches },
		);
	} catch (error) {
		if (error instanceof RegexSyntaxError) {
			throw new UnsupportedPatternError(source, error.message);
		}
		throw error;
	}
}

/**
 * Source plein-match équivalente au pattern (sans ancres externes) :
 * `^(?:<résultat>)$` accepte exactement les chaînes que `pattern` trouve.
 */
export function fullMatchSource(source: string): string {
	const ast = parseSource(source);
	try {
		return fullMatchBranches(ast)
			.map((branch) => nodeToSource(branch, "alt"))
			.join("|");
	} catch (error) {
		if (error instanceof RegexSyntaxError) {
			throw new UnsupportedPatternError(source, error.message);
		}
		throw error;
	}
}

// ─── AST → source ────────────────────────────────────────────────────────────

const SYNTAX_CHARS = new Set("\\^$.|?*+()[]{}/");
const CLASS_SYNTAX_CHARS = new Set("\\]^-[");

function charToSource(code: number, inClass: boolean): string {
	const ch = String.fromCharCode(code);
	if (code >= 0x20 && code <= 0x7e) {
		const special = inClass ? CLASS_SYNTAX_CHARS : SYNTAX_CHARS;
		return special.has(ch) ? `\\${ch}` : ch;
	}
	if (code === 0x09) return "\\t";
	if (code === 0x0a) return "\\n";
	if (code === 0x0d) return "\\r";
	return `\\u${code.toString(16).padStart(4, "0")}`;
}

function classToSource(ranges: readonly CharRange[]): string {
	const [only] = ranges;
	if (ranges.length === 1 && only && only.from === only.to) {
		return charToSource(only.from, false);
	}
	if (ranges.length === 1 && only && only.from === 0 && only.to === MAX_CODE_UNIT) {
		return "[\\s\\S]";
	}
	const body = ranges
		.map(({ from, to }) => {
			if (from === to) return charToSource(from, true);
			const separator = to === from + 1 ? "" : "-";
			return `${charToSource(from, true)}${separator}${charToSource(to, true)}`;
		})
		.join("");
	return `[${body}]`;
}

type Precedence = "alt" | "concat" | "atom";

function nodeToSource(node: RegexNode, context: Precedence): string {
	switch (node.kind) {
		case "empty":
		case "anchor":
			return context === "atom" ? "(?:)" : "";
		case "charClass":
			return node.ranges.length === 0 ? "[]" : classToSource(node.ranges);
		case "concat": {
			const text = node.items.map((item) => nodeToSource(item, "concat")).join("");
			return context === "atom" ? `(?:${text})` : text;
		}
		case "alt": {
			const text = node.options.map((option) => nodeToSource(option, "alt")).join("|");
			return context === "alt" ? text : `(?:${text})`;
		}
		case "repeat": {
			const child = nodeToSource(node.child, "atom");
			const { min, max } = node;
			let quantifier: string;
			if (min === 0 && max === null) quantifier = "*";
			else if (min === 1 && max === null) quantifier = "+";
			else if (min === 0 && max === 1) quantifier = "?";
			else if (max === null) quantifier = `{${min},}`;
			else if (min === max) quantifier = `{${min}}`;
			else quantifier = `{${min},${max}}`;
			const text = `${child}${quantifier}`;
			return context === "atom" ? `(?:${text})` : text;
		}
	}
}

// ─── Automata constructors ───────────────────────────────────────────────────

/** Σ* */
export function universalDfa(): Dfa {
	return {
		states: [
			{ accepting: true, edges: [{ from: 0, to: MAX_CODE_UNIT, target: 0 }] },
		],
	};
}

/** ∅ */
export function emptyDfa(): Dfa {
	return { states: [{ accepting: false, edges: [] }] };
}

/**
 * DFA des chaînes dont la longueur (en unités UTF-16) est dans `lengths`.
 * `undefined` si la borne supérieure est trop grande pour être dépliée.
 */
export function lengthDfa(lengths: Interval): Dfa | undefined {
	const min = lengths.lower.bounded ? Math.max(0, Math.ceil(lengths.lower.value)) : 0;
	const max = lengths.upper.bounded ? Math.floor(lengths.upper.value) : null;
	if (max !== null && max < min) return emptyDfa();
	const last = max ?? min;
	if (last > MAX_DFA_STATES) return undefined;

	const states: DfaState[] = [];
	for (let i = 0; i <= last; i++) {
		const edges: DfaEdge[] = [];
		if (i < last) edges.push({ from: 0, to: MAX_CODE_UNIT, target: i + 1 });
		else if (max === null) edges.push({ from: 0, to: MAX_CODE_UNIT, target: i });
		states.push({ accepting: i >= min, edges });
	}
	return { states };
}

/** DFA (trie) acceptant exactement les chaînes données. */
export function literalDfa(values: Iterable<string>): Dfa {
	const states: DfaState[] = [{ accepting: false, edges: [] }];
	const children: Map<number, number>[] = [new Map()];
	for (const value of values) {
		let current = 0;
		for (let i = 0; i < value.length; i++) {
			const code = value.charCodeAt(i);
			const table = children[current] ?? new Map<number, number>();
			let next = table.get(code);
			if (next === undefined) {
				next = states.length;
				states.push({ accepting: false, edges: [] });
				children.push(new Map());
				table.set(code, next);
			}
			current = next;
		}
		const state = states[current];
		if (state) state.accepting = true;
	}
	children.forEach((table, id) => {
		const state = states[id];
		if (!state) return;
		state.edges = Array.from(table.entries())
			.sort(([a], [b]) => a - b)
			.map(([code, target]) => ({ from: code, to: code, target }));
	});
	return { states };
}

// ─── Stepping ────────────────────────────────────────────────────────────────

/** Cible de la transition sur `code`, ou -1 (état mort). */
export function step(dfa: Dfa, state: number, code: number): number {
	const edges = dfa.states[state]?.edges ?? [];
	let low = 0;
	let high = edges.length - 1;
	while (low <= high) {
		const mid = (low + high) >> 1;
		const edge = edges[mid];
		if (!edge) break;
		if (code < edge.from) high = mid - 1;
		else if (code > edge.to) low = mid + 1;
		else return edge.target;
	}
	return -1;
}

export function acceptsString(dfa: Dfa, input: string): boolean {
	let state = 0;
	for (let i = 0; i < input.length && state >= 0; i++) {
		state = step(dfa, state, input.charCodeAt(i));
	}
	return state >= 0 && (dfa.states[state]?.accepting ?? false);
}

// ─── Products ────────────────────────────────────────────────────────────────

type Tuple = number[];

function segmentBounds(components: readonly Dfa[], tuple: Tuple, withGaps: boolean): number[] {
	const cuts = new Set<number>();
	if (withGaps) {
		cuts.add(0);
		cuts.add(MAX_CODE_UNIT + 1);
	}
	tuple.forEach((id, i) => {
		if (id < 0) return;
		for (const edge of components[i]?.states[id]?.edges ?? []) {
			cuts.add(edge.from);
			cuts.add(edge.to + 1);
		}
	});
	return Array.from(cuts).sort((a, b) => a - b);
}

function flagsOf(components: readonly Dfa[], tuple: Tuple): boolean[] {
	return tuple.map((id, i) => id >= 0 && (components[i]?.states[id]?.accepting ?? false));
}

/**
 * Explore le produit synchrone de plusieurs DFA. `visit` reçoit chaque
 * tuple atteignable. Si `keepDead`, l'état où tous les composants sont
 * morts est conservé (nécessaire pour les compléments).
 */
function exploreProduct(
	components: readonly Dfa[],
	keepDead: boolean,
	visit: (tuple: Tuple, id: number) => void,
	link: (from: number, edges: DfaEdge[]) => void,
): void {
	const ids = new Map<string, number>();
	const queue: Tuple[] = [];
	const intern = (tuple: Tuple): number => {
		const key = tuple.join(",");
		const known = ids.get(key);
		if (known !== undefined) return known;
		if (ids.size >= MAX_PRODUCT_STATES) {
			throw new UnsupportedPatternError(
				"(product)",
				"combination of patterns is too complex",
			);
		}
		const id = ids.size;
		ids.set(key, id);
		queue.push(tuple);
		visit(tuple, id);
		return id;
	};

	intern(components.map(() => 0));
	for (let index = 0; index < queue.length; index++) {
		const tuple = queue[index] ?? [];
		const bounds = segmentBounds(components, tuple, keepDead);
		const edges: DfaEdge[] = [];
		for (let i = 0; i + 1 < bounds.length; i++) {
			const from = bounds[i] ?? 0;
			const to = (bounds[i + 1] ?? 0) - 1;
			const next = tuple.map((id, c) => {
				const component = components[c];
				return id >= 0 && component ? step(component, id, from) : -1;
			});
			if (!keepDead && next.every((id) => id < 0)) continue;
			edges.push({ from, to, target: intern(next) });
		}
		link(index, compactEdges(edges));
	}
}

/**
 * Produit de DFA : accepte `w` ssi `accept(flags)` où `flags[i]` indique
 * si le composant i accepte `w`. Couvre intersection, union et différence.
 */
export function productDfa(
	components: readonly Dfa[],
	accept: (flags: readonly boolean[]) => boolean,
): Dfa {
	const keepDead = accept(components.map(() => false));
	const states: DfaState[] = [];
	exploreProduct(
		components,
		keepDead,
		(tuple) => {
			states.push({ accepting: accept(flagsOf(components, tuple)), edges: [] });
		},
		(from, edges) => {
			const state = states[from];
			if (state) state.edges = edges;
		},
	);
	return { states };
}

export function intersectDfas(components: readonly Dfa[]): Dfa {
	if (components.length === 0) return universalDfa();
	return productDfa(components, (flags) => flags.every(Boolean));
}

/** L(a) \ L(b) */
export function differenceDfa(a: Dfa, b: Dfa): Dfa {
	return productDfa([a, b], ([inA, inB]) => inA === true && inB !== true);
}

/**
 * Vecteurs d'appartenance réalisables : pour chaque chaîne w, le vecteur
 * `[w ∈ L(c0), w ∈ L(c1), …]`. Chaque vecteur retourné est témoigné par
 * au moins une chaîne.
 */
export function membershipVectors(components: readonly Dfa[]): boolean[][] {
	const seen = new Map<string, boolean[]>();
	exploreProduct(
		components,
		true,
		(tuple) => {
			const flags = flagsOf(components, tuple);
			seen.set(flags.map(Number).join(""), flags);
		},
		() => {},
	);
	return Array.from(seen.values());
}

// ─── Analyses ────────────────────────────────────────────────────────────────

export function isEmptyLanguage(dfa: Dfa): boolean {
	return !dfa.states.some((state) => state.accepting);
}

/** États depuis lesquels un état acceptant est atteignable. */
function liveStates(dfa: Dfa): Set<number> {
	const reverse = new Map<number, number[]>();
	dfa.states.forEach((state, id) => {
		for (const edge of state.edges) {
			const sources = reverse.get(edge.target) ?? [];
			sources.push(id);
			reverse.set(edge.target, sources);
		}
	});
	const live = new Set<number>();
	const stack: number[] = [];
	dfa.states.forEach((state, id) => {
		if (state.accepting) {
			live.add(id);
			stack.push(id);
		}
	});
	for (let id = stack.pop(); id !== undefined; id = stack.pop()) {
		for (const source of reverse.get(id) ?? []) {
			if (!live.has(source)) {
				live.add(source);
				stack.push(source);
			}
		}
	}
	return live;
}

function liveTargets(dfa: Dfa, id: number, live: Set<number>): DfaEdge[] {
	return (dfa.states[id]?.edges ?? []).filter((edge) => live.has(edge.target));
}

/**
 * Ordre topologique des états vivants atteignables depuis l'état initial,
 * `undefined` si ce sous-graphe contient un cycle (langage infini).
 */
function liveTopologicalOrder(dfa: Dfa, live: Set<number>): number[] | undefined {
	if (!live.has(0)) return [];
	const reachable: number[] = [];
	const seen = new Set([0]);
	const stack = [0];
	for (let id = stack.pop(); id !== undefined; id = stack.pop()) {
		reachable.push(id);
		for (const edge of liveTargets(dfa, id, live)) {
			if (!seen.has(edge.target)) {
				seen.add(edge.target);
				stack.push(edge.target);
			}
		}
	}

	const indegree = new Map<number, number>();
	for (const id of reachable) {
		for (const edge of liveTargets(dfa, id, live)) {
			indegree.set(edge.target, (indegree.get(edge.target) ?? 0) + 1);
		}
	}
	const queue = reachable.filter((id) => !indegree.has(id));
	const order: number[] = [];
	for (let index = 0; index < queue.length; index++) {
		const id = queue[index] ?? 0;
		order.push(id);
		for (const edge of liveTargets(dfa, id, live)) {
			const remaining = (indegree.get(edge.target) ?? 1) - 1;
			indegree.set(edge.target, remaining);
			if (remaining === 0) queue.push(edge.target);
		}
	}
	return order.length === reachable.length ? order : undefined;
}

export interface LengthBounds {
	min: number;
	/** `Infinity` si le langage est infini */
	max: number;
}

/** Longueurs min / max des mots acceptés, `undefined` si le langage est vide. */
export function acceptedLengths(dfa: Dfa): LengthBounds | undefined {
	const live = liveStates(dfa);
	if (!live.has(0)) return undefined;

	let min = -1;
	const distance = new Map<number, number>([[0, 0]]);
	const queue = [0];
	for (let index = 0; index < queue.length && min < 0; index++) {
		const id = queue[index] ?? 0;
		const d = distance.get(id) ?? 0;
		if (dfa.states[id]?.accepting) {
			min = d;
			break;
		}
		for (const edge of liveTargets(dfa, id, live)) {
			if (!distance.has(edge.target)) {
				distance.set(edge.target, d + 1);
				queue.push(edge.target);
			}
		}
	}

	const order = liveTopologicalOrder(dfa, live);
	if (!order) return { min, max: Number.POSITIVE_INFINITY };

	const longest = new Map<number, number>();
	for (const id of [...order].reverse()) {
		let best = dfa.states[id]?.accepting ? 0 : Number.NEGATIVE_INFINITY;
		for (const edge of liveTargets(dfa, id, live)) {
			best = Math.max(best, 1 + (longest.get(edge.target) ?? Number.NEGATIVE_INFINITY));
		}
		longest.set(id, best);
	}
	return { min, max: longest.get(0) ?? min };
}

/**
 * Énumère le langage s'il est fini et d'au plus `limit` mots.
 * `undefined` sinon.
 */
export function enumerateLanguage(dfa: Dfa, limit: number): string[] | undefined {
	const live = liveStates(dfa);
	if (!live.has(0)) return [];
	const order = liveTopologicalOrder(dfa, live);
	if (!order) return undefined;

	const counts = new Map<number, number>();
	for (const id of [...order].reverse()) {
		let total = dfa.states[id]?.accepting ? 1 : 0;
		for (const edge of liveTargets(dfa, id, live)) {
			total += (edge.to - edge.from + 1) * (counts.get(edge.target) ?? 0);
		}
		counts.set(id, Math.min(total, limit + 1));
	}
	if ((counts.get(0) ?? 0) > limit) return undefined;

	const words: string[] = [];
	const walk = (id: number, prefix: string): void => {
		if (dfa.states[id]?.accepting) words.push(prefix);
		for (const edge of liveTargets(dfa, id, live)) {
			for (let code = edge.from; code <= edge.to; code++) {
				walk(edge.target, prefix + String.fromCharCode(code));
			}
		}
	};
	walk(0, "");
	return words;
}
