import type { DocumentFetcher, FetchedDocument, Logger } from "../../src";

// ─── Shared fixtures for the semantic tests ──────────────────────────────────

export const QUANTITY_KINDS_TTL = `
@prefix skos: <http://www.w3.org/2004/02/skos/core#> .
@prefix qk: <http://qudt.org/vocab/quantitykind/> .

qk:ThermodynamicTemperature skos:broader qk:Temperature .
qk:CelsiusTemperature skos:broader qk:ThermodynamicTemperature .
qk:Pressure skos:narrower qk:StaticPressure .
`;

export const PEOPLE_TTL = `
@prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#> .
@prefix foaf: <http://xmlns.com/foaf/0.1/> .
@prefix ex: <http://example.org/> .

ex:Employee rdfs:subClassOf foaf:Person .
ex:Manager rdfs:subClassOf ex:Employee .
`;

/** Fetcher en mémoire : URL → document, avec journal des appels. */
export function fakeFetcher(documents: Record<string, string | FetchedDocument>): {
	fetcher: DocumentFetcher;
	calls: string[];
} {
	const calls: string[] = [];
	const fetcher: DocumentFetcher = async (url) => {
		calls.push(url);
		const document = documents[url];
		if (document === undefined) throw new Error(`HTTP 404 Not Found`);
		return typeof document === "string" ? { body: document, contentType: "text/turtle" } : document;
	};
	return { fetcher, calls };
}

/** Logger qui garde chaque enregistrement. */
export function recordingLogger(): { logger: Logger; records: string[] } {
	const records: string[] = [];
	const logger: Logger = {
		debug: (message) => records.push(`debug: ${message}`),
		info: (message) => records.push(`info: ${message}`),
		warn: (message) => records.push(`warn: ${message}`),
	};
	return { logger, records };
}
