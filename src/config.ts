// ─── Configuration ───────────────────────────────────────────────────────────
//
// Réglages explicites (getters / setters), sans couplage à l'environnement.
// Chaque `SubschemaChecker` reçoit une instance ; `getDefaultConfig()`
// fournit l'instance partagée du process.

export interface SubschemaConfigOptions {
	semanticReasoning?: boolean;
	debug?: boolean;
	warnUninhabited?: boolean;
	semanticCacheDir?: string | null;
	semanticGraphSources?: readonly string[];
}

export interface SubschemaConfigSnapshot {
	semanticReasoning: boolean;
	debug: boolean;
	warnUninhabited: boolean;
	semanticCacheDir: string | null;
	semanticGraphSources: string[];
}

export class SubschemaConfig {
	private semanticReasoning: boolean;
	private debug: boolean;
	private warnUninhabited: boolean;
	private semanticCacheDir: string | null;
	private readonly semanticGraphSources: string[] = [];

	constructor(options: SubschemaConfigOptions = {}) {
		this.semanticReasoning = options.semanticReasoning ?? true;
		this.debug = options.debug ?? false;
		this.warnUninhabited = options.warnUninhabited ?? false;
		this.semanticCacheDir = options.semanticCacheDir ?? null;
		for (const source of options.semanticGraphSources ?? []) {
			this.addSemanticGraphSource(source);
		}
	}

	isSemanticReasoningEnabled(): boolean {
		return this.semanticReasoning;
	}

	/** Active ou désactive la couche sémantique (`stype`). */
	setSemanticReasoning(enabled = true): void {
		this.semanticReasoning = enabled;
	}

	isDebugEnabled(): boolean {
		return this.debug;
	}

	setDebug(enabled = false): void {
		this.debug = enabled;
	}

	isWarnUninhabitedEnabled(): boolean {
		return this.warnUninhabited;
	}

	/** Signale les sous-schemas qui se canonicalisent en Bottom. */
	setWarnUninhabited(enabled = false): void {
		this.warnUninhabited = enabled;
	}

	getSemanticCacheDir(): string | null {
		return this.semanticCacheDir;
	}

	setSemanticCacheDir(dir: string | null): void {
		this.semanticCacheDir = dir;
	}

	getSemanticGraphSources(): readonly string[] {
		return this.semanticGraphSources;
	}

	/** Ajoute une source d'ontologie (URL ou fichier), sans doublon. */
	addSemanticGraphSource(source: string): void {
		if (!this.semanticGraphSources.includes(source)) {
			this.semanticGraphSources.push(source);
		}
	}

	snapshot(): SubschemaConfigSnapshot {
		return {
			semanticReasoning: this.semanticReasoning,
			debug: this.debug,
			warnUninhabited: this.warnUninhabited,
			semanticCacheDir: this.semanticCacheDir,
			semanticGraphSources: [...this.semanticGraphSources],
		};
	}
}

let defaultConfig: SubschemaConfig | undefined;

export function getDefaultConfig(): SubschemaConfig {
	defaultConfig ??= new SubschemaConfig();
	return defaultConfig;
}
