import { describe, expect, it, vi } from "vitest";
import type { Catalog, SourceDatasetDefinition } from "../../catalog/types";
import type { FilterColumnName, FilterValueSet } from "../../filters/types";
import { InputError } from "../../result/errors";
import { assemble, buildOutputDataset } from "../assembler";
import type { UserInputRecord } from "../types";

function makeInput(overrides: Partial<UserInputRecord> = {}): UserInputRecord {
	return {
		projectId: "demo-project",
		region: "asia-northeast1",
		viewPrefix: "filtered_",
		clientName: "Acme Co",
		outputDatasets: [{}],
		...overrides,
	};
}

const statusFilters: FilterValueSet = new Map<FilterColumnName, string[]>([["status", ["active", "done"]]]);

describe("buildOutputDataset", () => {
	it("derives id, description and labels from the key", () => {
		const dataset = buildOutputDataset("acme_co", "Acme Co");
		expect(dataset.datasetId).toBe("acme_co_filtered");
		expect(dataset.description).toBe("Acme_Co filtered views for Acme Co");
		expect(dataset.monthsBack).toBe(18);
		expect([...dataset.labels]).toEqual([
			["environment", "production"],
			["client", "acme_co"],
			["team", "acme_co"],
		]);
	});

	it("uses the given months back", () => {
		expect(buildOutputDataset("finance", "Acme Co", 6).monthsBack).toBe(6);
	});
});

describe("assemble", () => {
	it("copies the basics", () => {
		const config = assemble(makeInput(), new Map());
		expect(config.projectId).toBe("demo-project");
		expect(config.region).toBe("asia-northeast1");
		expect(config.viewPrefix).toBe("filtered_");
	});

	it("keys the primary dataset by client when no key is given", () => {
		const config = assemble(makeInput(), new Map());
		expect([...config.outputDatasetsConfig.keys()]).toEqual(["acme_co"]);
	});

	it("adds secondary datasets in order with their own labels", () => {
		const config = assemble(
			makeInput({ outputDatasets: [{ monthsBack: 24 }, { key: "finance", monthsBack: 6 }, { key: "ops" }] }),
			new Map(),
		);
		expect([...config.outputDatasetsConfig.keys()]).toEqual(["acme_co", "finance", "ops"]);
		expect(config.outputDatasetsConfig.get("acme_co")?.monthsBack).toBe(24);

		const finance = config.outputDatasetsConfig.get("finance");
		expect(finance?.description).toBe("Finance filtered views for Acme Co");
		expect(finance?.monthsBack).toBe(6);
		expect(finance?.labels.get("team")).toBe("finance");
		expect(finance?.labels.get("client")).toBe("acme_co");
		expect(config.outputDatasetsConfig.get("ops")?.monthsBack).toBe(18);
	});

	it("always labels datasets with exactly environment, client and team", () => {
		const config = assemble(makeInput({ outputDatasets: [{}, { key: "finance" }] }), new Map());
		for (const dataset of config.outputDatasetsConfig.values()) {
			expect([...dataset.labels.keys()]).toEqual(["environment", "client", "team"]);
		}
	});

	it("replaces a repeated key in place and warns", () => {
		const logger = vi.fn();
		const config = assemble(
			makeInput({ outputDatasets: [{}, { key: "finance", monthsBack: 3 }, { key: "acme_co", monthsBack: 9 }] }),
			new Map(),
			{ logger },
		);
		expect([...config.outputDatasetsConfig.keys()]).toEqual(["acme_co", "finance"]);
		expect(config.outputDatasetsConfig.get("acme_co")?.monthsBack).toBe(9);
		expect(logger).toHaveBeenCalledWith(
			"warn",
			'Output dataset "acme_co" defined more than once; keeping the last',
		);
	});

	it("builds every catalog dataset targeting the client key", () => {
		const config = assemble(makeInput({ outputDatasets: [{ key: "custom" }] }), statusFilters);
		expect([...config.sourceDatasetsConfig.keys()]).toEqual([
			"raw_lake",
			"analytics_raw",
			"transaction_raw",
		]);
		for (const dataset of config.sourceDatasetsConfig.values()) {
			expect(dataset.targetDatasetKey).toBe("acme_co");
			expect(dataset.sourceProjectId).toBeUndefined();
		}
	});

	it("resolves filters for each table", () => {
		const config = assemble(makeInput(), statusFilters);
		const rawLake = config.sourceDatasetsConfig.get("raw_lake");
		expect([...(rawLake?.tables.keys() ?? [])]).toEqual([
			"users",
			"transactions",
			"events",
			"orders",
			"logs",
		]);
		expect(rawLake?.tables.get("orders")).toEqual({
			sourceTableId: "orders",
			viewName: "orders",
			filterColumns: [{ columnName: "status", condition: "IN ('active', 'done')", operator: "AND" }],
			additionalWhere: "",
			description: "orders filtered view",
		});
		expect(rawLake?.tables.get("events")?.filterColumns).toEqual([]);
		expect(config.sourceDatasetsConfig.get("transaction_raw")?.tables.get("payments")?.filterColumns).toEqual(
			[],
		);
	});

	it("uses a custom catalog and carries the source project", () => {
		const catalog: Catalog = {
			tableFilters: new Map<string, FilterColumnName[]>([["orders", ["client_id", "status"]]]),
			sourceDatasets: new Map<string, SourceDatasetDefinition>([
				["sales", { description: "Sales", tables: ["orders"], sourceProjectId: "lake-prod" }],
			]),
		};
		const config = assemble(makeInput(), new Map<FilterColumnName, string[]>([["client_id", ["c'1"]]]), {
			catalog,
			escapeLiterals: true,
		});
		const sales = config.sourceDatasetsConfig.get("sales");
		expect(sales?.sourceProjectId).toBe("lake-prod");
		expect(sales?.description).toBe("Sales");
		expect(sales?.tables.get("orders")?.filterColumns).toEqual([
			{ columnName: "client_id", condition: "= 'c''1'", operator: "AND" },
		]);
	});

	it("logs one debug event per table", () => {
		const logger = vi.fn();
		assemble(makeInput(), statusFilters, { logger });
		const tableEvents = logger.mock.calls.filter(
			([level, message]) => level === "debug" && String(message).startsWith("Resolved"),
		);
		expect(tableEvents).toHaveLength(11);
		expect(logger).toHaveBeenCalledWith("debug", "Resolved 1 filter(s) for raw_lake.orders", {
			dataset: "raw_lake",
			table: "orders",
			filters: 1,
		});
	});

	it("rejects a record without output datasets", () => {
		expect(() => assemble(makeInput({ outputDatasets: [] }), new Map())).toThrow(InputError);
	});

	it("rejects a secondary dataset without a key", () => {
		expect(() => assemble(makeInput({ outputDatasets: [{}, {}] }), new Map())).toThrow(
			"Output dataset at index 1 must have a key",
		);
	});

	it("rejects a non-positive months back", () => {
		expect(() => assemble(makeInput({ outputDatasets: [{ monthsBack: 0 }] }), new Map())).toThrow(
			'Output dataset "acme_co" monthsBack must be a positive integer',
		);
	});
});
