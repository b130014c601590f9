import { Effect } from "effect";
import {
  type Driver,
  type QueryResult,
  Record as Neo4jRecord,
  type ResultSummary,
  type Session,
} from "neo4j-driver";
import { beforeEach, describe, expect, it } from "vitest";
import { type DeepMockProxy, mock, mockDeep } from "vitest-mock-extended";
import { createRelationship } from "../../src/graph/relationship.js";
import type { StoreSession } from "../../src/store/graph-store.js";
import { Cypher, makeNeo4jGraphStore } from "../../src/store/neo4j-store.js";

const URI = "bolt://test:7687";

// A plain object: the awaited value must not expose a mocked `then`
const result = (rows: Array<{ [key: string]: unknown }>): QueryResult => ({
  records: rows.map(
    (row) => new Neo4jRecord(Object.keys(row), Object.values(row)),
  ),
  summary: mock<ResultSummary>(),
});

describe("Neo4j graph store", () => {
  let driver: DeepMockProxy<Driver>;
  let session: DeepMockProxy<Session>;

  beforeEach(() => {
    driver = mockDeep<Driver>();
    session = mockDeep<Session>();
    driver.session.mockReturnValue(session);
    session.close.mockResolvedValue(undefined);
  });

  const withSession = <A, E>(use: (s: StoreSession) => Effect.Effect<A, E>) => {
    const store = makeNeo4jGraphStore(driver, { uri: URI });
    return Effect.runPromise(
      Effect.scoped(Effect.flatMap(store.openSession, use)),
    );
  };

  describe("verifyConnectivity", () => {
    it("succeeds when the driver reaches the server", async () => {
      driver.verifyConnectivity.mockResolvedValue({ address: "test:7687" });
      const store = makeNeo4jGraphStore(driver, { uri: URI, database: "graph" });

      await Effect.runPromise(store.verifyConnectivity);

      expect(driver.verifyConnectivity).toHaveBeenCalledWith({ database: "graph" });
    });

    it("fails with ConnectivityError when the server is unreachable", async () => {
      driver.verifyConnectivity.mockRejectedValue(new Error("ECONNREFUSED"));
      const store = makeNeo4jGraphStore(driver, { uri: URI });

      const error = await Effect.runPromise(Effect.flip(store.verifyConnectivity));

      expect(error._tag).toBe("ConnectivityError");
      expect(error.uri).toBe(URI);
      expect(error.message).toBe(`Cannot reach graph store at ${URI}: ECONNREFUSED`);
    });
  });

  describe("upsertNode", () => {
    it("merges the node by name and type", async () => {
      session.run.mockResolvedValue(result([]));

      await withSession((s) =>
        s.upsertNode({ name: "In", type: "Test.Service", properties: { role: "Service" } }),
      );

      expect(session.run).toHaveBeenCalledWith(Cypher.upsertNode, {
        name: "In",
        type: "Test.Service",
        properties: { role: "Service", name: "In", type: "Test.Service" },
      });
      expect(driver.session).toHaveBeenCalledWith({
        database: undefined,
        defaultAccessMode: "WRITE",
      });
      expect(session.close).toHaveBeenCalledTimes(1);
    });

    it("fails with StoreError when the query fails", async () => {
      session.run.mockRejectedValue(new Error("boom"));

      const error = await withSession((s) =>
        Effect.flip(s.upsertNode({ name: "In", type: "T", properties: {} })),
      );

      expect(error._tag).toBe("StoreError");
      expect(error.message).toBe("Query failed: boom");
      expect(session.close).toHaveBeenCalledTimes(1);
    });
  });

  describe("upsertRelationship", () => {
    it("merges the relationship keyed by rule name", async () => {
      session.run.mockResolvedValue(result([{ count: 1 }]));

      const merged = await withSession((s) =>
        s.upsertRelationship(
          createRelationship("Router", "Out", "SENDS_TO", { rule_name: "R" }),
        ),
      );

      expect(merged).toBe(true);
      expect(session.run).toHaveBeenCalledWith(Cypher.upsertRelationship("SENDS_TO"), {
        source: "Router",
        target: "Out",
        sourceType: null,
        targetType: null,
        ruleKey: "R",
        properties: { rule_name: "R" },
      });
      expect(Cypher.upsertRelationship("SENDS_TO")).toContain(
        "MERGE (s)-[r:SENDS_TO {rule_key: $ruleKey}]->(t)",
      );
    });

    it("matches endpoints by name and type when the types are known", async () => {
      session.run.mockResolvedValue(result([{ count: 1 }]));

      await withSession((s) =>
        s.upsertRelationship(createRelationship("In", "Router", "ROUTES_TO"), {
          sourceType: "Test.Service",
          targetType: "Test.Router",
        }),
      );

      expect(session.run).toHaveBeenCalledWith(Cypher.upsertRelationship("ROUTES_TO"), {
        source: "In",
        target: "Router",
        sourceType: "Test.Service",
        targetType: "Test.Router",
        ruleKey: "",
        properties: {},
      });
      expect(Cypher.upsertRelationship("ROUTES_TO")).toContain(
        "WHERE $sourceType IS NULL OR s.type = $sourceType",
      );
    });

    it("reports a missing endpoint", async () => {
      session.run.mockResolvedValue(result([{ count: 0 }]));

      const merged = await withSession((s) =>
        s.upsertRelationship(createRelationship("A", "Ghost", "ROUTES_TO")),
      );

      expect(merged).toBe(false);
    });
  });

  describe("verification queries", () => {
    it("reads counts", async () => {
      session.run.mockResolvedValue(result([{ count: 7 }]));

      const count = await withSession((s) => s.countNodes);

      expect(count).toBe(7);
      expect(session.run).toHaveBeenCalledWith(Cypher.countNodes, {});
    });

    it("reads the relationship type distribution", async () => {
      session.run.mockResolvedValue(
        result([
          { type: "ROUTES_TO", count: 2 },
          { type: "SENDS_TO", count: 5 },
        ]),
      );

      const distribution = await withSession((s) => s.typeDistribution("relationship"));

      expect(distribution).toEqual({ ROUTES_TO: 2, SENDS_TO: 5 });
      expect(session.run).toHaveBeenCalledWith(Cypher.relationshipTypes, {});
    });
  });
});
