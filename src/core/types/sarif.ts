// CHANGE: SARIF 2.1.0 subset emitted by the sarif output format
// WHY: Code-scanning front ends ingest SARIF; only the fields doculint fills are modeled
// SOURCE: https://docs.oasis-open.org/sarif/sarif/v2.1.0/sarif-v2.1.0.html

/**
 * Локация в SARIF формате.
 */
export interface SarifLocation {
	readonly physicalLocation: {
		readonly artifactLocation: {
			readonly uri: string;
		};
		readonly region: {
			readonly startLine: number;
			readonly startColumn: number;
		};
	};
}

/**
 * Результат проверки в SARIF формате.
 *
 * @property locations Empty for package-scoped diagnostics
 */
export interface SarifResult {
	readonly ruleId: string;
	readonly level: "warning";
	readonly message: {
		readonly text: string;
	};
	readonly locations: ReadonlyArray<SarifLocation>;
}

export interface SarifRule {
	readonly id: string;
	readonly shortDescription: {
		readonly text: string;
	};
}

/**
 * SARIF log with a single run.
 */
export interface SarifLog {
	readonly $schema: string;
	readonly version: "2.1.0";
	readonly runs: ReadonlyArray<{
		readonly tool: {
			readonly driver: {
				readonly name: string;
				readonly informationUri?: string;
				readonly rules: ReadonlyArray<SarifRule>;
			};
		};
		readonly results: ReadonlyArray<SarifResult>;
	}>;
}
