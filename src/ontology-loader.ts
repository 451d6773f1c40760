import { createHash } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { extname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Parser, type Quad, Writer } from "n3";
import { type Logger, silentLogger } from "./logger";

// ─── Ontology Loader ─────────────────────────────────────────────────────────
//
// Charge un document RDF (fichier local ou URL) et retourne ses quads.
//
// Un échec n'est JAMAIS levé : il est retourné comme `GraphLoadFailure`,
// journalisé, et le graphe reste inchangé (zéro quad).

export const WELL_KNOWN_ONTOLOGIES = {
	qudt: "https://qudt.org/vocab/quantitykind/",
	foaf: "http://xmlns.com/foaf/0.1/",
	skos: "http://www.w3.org/2004/02/skos/core#",
} as const;

export type WellKnownOntology = keyof typeof WELL_KNOWN_ONTOLOGIES;

export function isWellKnownOntology(name: string): name is WellKnownOntology {
	return Object.hasOwn(WELL_KNOWN_ONTOLOGIES, name);
}

export interface FetchedDocument {
	body: string;
	contentType: string | null;
}

/** Récupère un document distant ; lève une exception en cas d'échec. */
export type DocumentFetcher = (url: string) => Promise<FetchedDocument>;

export interface GraphLoadFailure {
	source: string;
	reason: string;
}

export interface LoadResult {
	source: string;
	quads: Quad[];
	fromCache: boolean;
	failure?: GraphLoadFailure;
}

export interface OntologyLoaderOptions {
	fetcher?: DocumentFetcher;
	/** Répertoire de cache N-Triples des documents distants */
	cacheDir?: string | null;
	logger?: Logger;
}

const ACCEPT = "text/turtle, application/n-triples, application/trig, text/n3;q=0.9, */*;q=0.1";

export const fetchDocument: DocumentFetcher = async (url) => {
	const response = await fetch(url, { redirect: "follow", headers: { Accept: ACCEPT } });
	if (!response.ok) throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
	return { body: await response.text(), contentType: response.headers.get("content-type") };
};

// ─── Format detection ────────────────────────────────────────────────────────

type Syntax = { format: string } | { unsupported: string };

const MEDIA_TYPES: Record<string, Syntax> = {
	"text/turtle": { format: "Turtle" },
	"application/x-turtle": { format: "Turtle" },
	"application/n-triples": { format: "N-Triples" },
	"application/n-quads": { format: "N-Quads" },
	"application/trig": { format: "TriG" },
	"text/n3": { format: "N3" },
	"application/rdf+xml": { unsupported: "RDF/XML" },
	"application/xml": { unsupported: "RDF/XML" },
	"application/ld+json": { unsupported: "JSON-LD" },
};

const EXTENSIONS: Record<string, Syntax> = {
	".ttl": { format: "Turtle" },
	".turtle": { format: "Turtle" },
	".nt": { format: "N-Triples" },
	".nq": { format: "N-Quads" },
	".trig": { format: "TriG" },
	".n3": { format: "N3" },
	".rdf": { unsupported: "RDF/XML" },
	".owl": { unsupported: "RDF/XML" },
	".xml": { unsupported: "RDF/XML" },
	".jsonld": { unsupported: "JSON-LD" },
	".json": { unsupported: "JSON-LD" },
};

/** Syntaxe d'un document : type MIME d'abord, extension ensuite, Turtle par défaut. */
export function detectSyntax(location: string, contentType: string | null): Syntax {
	const media = contentType?.split(";")[0]?.trim().toLowerCase();
	const byMedia = media ? MEDIA_TYPES[media] : undefined;
	if (byMedia) return byMedia;
	let path = location;
	if (/^https?:\/\//.test(location)) path = new URL(location).pathname;
	return EXTENSIONS[extname(path).toLowerCase()] ?? { format: "Turtle" };
}

function isRemote(source: string): boolean {
	return /^https?:\/\//.test(source);
}

function reasonOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function toNTriples(quads: readonly Quad[]): Promise<string> {
	return new Promise((resolve, reject) => {
		const writer = new Writer({ format: "N-Triples" });
		writer.addQuads([...quads]);
		writer.end((error, result: string) => (error ? reject(error) : resolve(result)));
	});
}

// ─── Loader ──────────────────────────────────────────────────────────────────

export class OntologyLoader {
	private readonly fetcher: DocumentFetcher;
	private readonly cacheDir: string | null;
	private readonly logger: Logger;

	constructor(options: OntologyLoaderOptions = {}) {
		this.fetcher = options.fetcher ?? fetchDocument;
		this.cacheDir = options.cacheDir ?? null;
		this.logger = options.logger ?? silentLogger;
	}

	/**
	 * Charge une source : nom d'ontologie connue (`qudt`, `foaf`, `skos`),
	 * URL http(s), URL `file:` ou chemin local.
	 */
	async load(source: string): Promise<LoadResult> {
		const location = isWellKnownOntology(source) ? WELL_KNOWN_ONTOLOGIES[source] : source;
		try {
			const result = isRemote(location)
				? await this.loadRemote(location)
				: await this.loadFile(location);
			this.logger.info("ontology loaded", {
				source,
				quads: result.quads.length,
				fromCache: result.fromCache,
			});
			return { ...result, source };
		} catch (error) {
			const failure: GraphLoadFailure = { source, reason: reasonOf(error) };
			this.logger.warn("ontology load failed", { ...failure });
			return { source, quads: [], fromCache: false, failure };
		}
	}

	async loadAll(sources: readonly string[]): Promise<LoadResult[]> {
		return Promise.all(sources.map((source) => this.load(source)));
	}

	/** Chemin du fichier de cache d'une URL, `null` sans répertoire de cache. */
	cachePath(url: string): string | null {
		if (this.cacheDir === null) return null;
		const digest = createHash("sha256").update(url).digest("hex");
		return join(this.cacheDir, `${digest}.nt`);
	}

	private async loadFile(location: string): Promise<Omit<LoadResult, "source">> {
		const path = location.startsWith("file:") ? fileURLToPath(location) : location;
		const body = await readFile(path, "utf8");
		return { quads: parseDocument(body, detectSyntax(path, null), location), fromCache: false };
	}

	private async loadRemote(url: string): Promise<Omit<LoadResult, "source">> {
		const cached = await this.readCache(url);
		if (cached) return { quads: cached, fromCache: true };

		const document = await this.fetcher(url);
		const quads = parseDocument(document.body, detectSyntax(url, document.contentType), url);
		await this.writeCache(url, quads);
		return { quads, fromCache: false };
	}

	private async readCache(url: string): Promise<Quad[] | undefined> {
		const path = this.cachePath(url);
		if (path === null) return undefined;
		try {
			return parseDocument(await readFile(path, "utf8"), { format: "N-Triples" }, url);
		} catch (error) {
			if (!isMissingFile(error)) {
				this.logger.warn("ontology cache unreadable", { url, path, reason: reasonOf(error) });
			}
			return undefined;
		}
	}

	private async writeCache(url: string, quads: readonly Quad[]): Promise<void> {
		const path = this.cachePath(url);
		if (path === null || this.cacheDir === null) return;
		try {
			await mkdir(this.cacheDir, { recursive: true });
			await writeFile(path, await toNTriples(quads), "utf8");
		} catch (error) {
			this.logger.warn("ontology cache not written", { url, path, reason: reasonOf(error) });
		}
	}
}

/**
 * @throws Error si la syntaxe n'est pas supportée ou le document invalide
 */
function parseDocument(body: string, syntax: Syntax, baseIRI: string): Quad[] {
	if ("unsupported" in syntax) throw new Error(`unsupported RDF syntax: ${syntax.unsupported}`);
	const base = isRemote(baseIRI) ? baseIRI : undefined;
	return new Parser({ format: syntax.format, baseIRI: base }).parse(body);
}
