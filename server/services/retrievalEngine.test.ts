import { describe, expect, it } from "vitest";
import type { ExtractionResult, QueryClassification, QueryIntent } from "@shared/schema";
import { buildSampleSnapshot } from "./__fixtures__/sampleSnapshot";
import { EntityExtractor } from "./entityExtractor";
import { StaleSnapshotError } from "./errors";
import { IntentClassifier, emptyExtraction } from "./intentClassifier";
import {
  RetrievalEngine,
  applyStructuralFilters,
  detectStrategyLens,
  overlapScore,
  pointsPerMillion,
  rankBy,
  sortOrderFor,
} from "./retrievalEngine";

const snapshot = buildSampleSnapshot();
const extractor = new EntityExtractor();
const classifier = new IntentClassifier();
const engine = new RetrievalEngine();

function classify(query: string): QueryClassification {
  return classifier.classify(query, extractor.extract(query, snapshot), {
    originalQuery: query,
    contextResolved: false,
    generationId: snapshot.generationId,
  });
}

function manual(intent: QueryIntent, extracted: Partial<ExtractionResult> = {}, query = ""): QueryClassification {
  return {
    intent,
    confidence: 0.9,
    ruleId: intent,
    query,
    originalQuery: query,
    contextResolved: false,
    generationId: snapshot.generationId,
    extracted: { ...emptyExtraction(), ...extracted },
  };
}

function names(result: { ranked: Array<{ entity: { displayName: string } }> }): string[] {
  return result.ranked.map(entry => entry.entity.displayName);
}

describe("retrieval helpers", () => {
  it("computes points per million to two decimals", () => {
    const saliba = snapshot.dictionary.personsById.get(1);
    const haaland = snapshot.dictionary.personsById.get(5);
    if (!saliba || !haaland) throw new Error("sample players missing");
    expect(pointsPerMillion(saliba)).toBe(13.33);
    expect(pointsPerMillion(haaland)).toBe(10);
  });

  it("applies price bounds: strict under and over, inclusive between", () => {
    const between = applyStructuralFilters(snapshot.persons, { ...emptyExtraction(), price: { kind: "between", min: 60, max: 65 } });
    expect(between.map(person => person.id)).toEqual([1, 2, 6, 14, 17]);

    const over = applyStructuralFilters(snapshot.persons, { ...emptyExtraction(), price: { kind: "over", min: 130 } });
    expect(over.map(person => person.id)).toEqual([5]);
  });

  it("ranks price cheapest first and everything else highest first", () => {
    expect(sortOrderFor("price")).toBe("asc");
    expect(sortOrderFor("points")).toBe("desc");

    const defenders = snapshot.persons.filter(person => [1, 2, 9].includes(person.id));
    const cheapest = rankBy(defenders, person => person.price, 3, "asc");
    expect(cheapest.map(entry => [entry.entity.displayName, entry.value])).toEqual([
      ["T.Silva", 45],
      ["Gabriel", 60],
      ["Saliba", 60],
    ]);
    expect(rankBy(defenders, person => person.price, 1).map(entry => entry.entity.displayName)).toEqual(["Gabriel"]);
  });

  it("scores token overlap by frequency", () => {
    expect(overlapScore(["arsenal", "gunners"], ["arsenal", "arsenal", "defender"])).toBe(2);
    expect(overlapScore([], ["arsenal"])).toBe(0);
  });

  it("picks a strategy lens from the wording", () => {
    expect(detectStrategyLens("who should I captain")).toBe("captaincy");
    expect(detectStrategyLens("any differentials?")).toBe("differential");
    expect(detectStrategyLens("template players")).toBe("template");
    expect(detectStrategyLens("cheap enablers")).toBe("value");
    expect(detectStrategyLens("transfer advice")).toBe("form");
  });
});

describe("RetrievalEngine", () => {
  it("refuses a classification from another generation", () => {
    const other = buildSampleSnapshot(2);
    expect(() => engine.retrieve(classify("Saliba or Gabriel"), other, 5)).toThrow(StaleSnapshotError);
  });

  it("ranks a filtered statistic", () => {
    const result = engine.retrieve(classify("top 5 midfielders under £9m by points"), snapshot, 5);

    expect(result.sortKey).toBe("points");
    expect(result.totalMatched).toBe(8);
    expect(names(result)).toEqual(["Rice", "Foden", "Bernardo", "Martinelli", "Kulusevski"]);
    expect(result.ranked.map(entry => entry.value)).toEqual([90, 88, 85, 70, 65]);
    expect(result.ranked.map(entry => entry.rank)).toEqual([1, 2, 3, 4, 5]);
  });

  it("ranks the cheapest players in a position lowest price first", () => {
    const classification = classify("cheapest defenders");
    expect(classification.intent).toBe("filtered_statistic");
    expect(classification.extracted.statKey).toBe("price");

    const result = engine.retrieve(classification, snapshot, 5);
    expect(result.sortKey).toBe("price");
    expect(result.totalMatched).toBe(3);
    expect(names(result)).toEqual(["T.Silva", "Gabriel", "Saliba"]);
    expect(result.ranked.map(entry => entry.value)).toEqual([4.5, 6, 6]);
  });

  it("bounds results to topN and excludes inactive players by default", () => {
    const result = engine.retrieve(manual("team_position_filter", { teamId: 1 }), snapshot, 3);
    expect(result.totalMatched).toBe(6);
    expect(names(result)).toEqual(["Saka", "Raya", "Rice"]);

    const widened = engine.retrieve(manual("team_position_filter", { teamId: 1, includeUnavailable: true }), snapshot, 10);
    expect(widened.totalMatched).toBe(7);
    expect(names(widened)).toContain("White");

    expect(engine.retrieve(manual("team_position_filter", { teamId: 1 }), snapshot, 0).ranked).toHaveLength(1);
  });

  it("returns mentioned players in mention order", () => {
    const result = engine.retrieve(classify("Saliba or Gabriel"), snapshot, 5);
    expect(result.ranked.map(entry => [entry.rank, entry.entity.id, entry.value])).toEqual([
      [1, 1, null],
      [2, 2, null],
    ]);
    expect(result.totalMatched).toBe(2);
  });

  it("surfaces unknown and unavailable mentions", () => {
    expect(engine.retrieve(classify("Messi's stats"), snapshot, 5)).toMatchObject({
      ranked: [],
      notFound: [{ span: "Messi", suggestions: [] }],
    });

    const injured = engine.retrieve(classify("is White fit"), snapshot, 5);
    expect(injured.ranked).toEqual([]);
    expect(injured.unavailable).toHaveLength(1);
    expect(injured.unavailable[0]).toMatchObject({ span: "White", reason: "injured and unavailable for selection" });
    expect(injured.unavailable[0]?.entity.id).toBe(11);
  });

  it("lists a team's next fixtures from its point of view", () => {
    const result = engine.retrieve(classify("Arsenal's next 3 fixtures"), snapshot, 5);
    expect(result.fixtures.map(fixture => [fixture.id, fixture.venue, fixture.opponent, fixture.difficulty])).toEqual([
      [102, "home", "Liverpool", 4],
      [105, "away", "Chelsea", 3],
      [107, "home", "Spurs", 3],
    ]);
    expect(result.totalMatched).toBe(3);
  });

  it("uses a mentioned player's team for fixtures", () => {
    const result = engine.retrieve(classify("when does Salah play next"), snapshot, 5);
    expect(result.fixtures.map(fixture => [fixture.id, fixture.venue, fixture.difficulty])).toEqual([
      [102, "away", 4],
      [106, "home", 2],
      [108, "away", 4],
    ]);
  });

  it("lists the next gameweek when no team is given", () => {
    const next = engine.retrieve(manual("fixture_lookup"), snapshot, 5);
    expect(next.fixtures.map(fixture => `${fixture.homeTeam} v ${fixture.awayTeam}`)).toEqual([
      "Arsenal v Liverpool",
      "Man City v Chelsea",
    ]);
    expect(next.fixtures[0]?.venue).toBeUndefined();

    const gw11 = engine.retrieve(manual("fixture_lookup", { gameweek: 11 }), snapshot, 5);
    expect(gw11.fixtures.map(fixture => fixture.id)).toEqual([105, 106]);
  });

  it("ranks knowledge entries by keyword hits", () => {
    expect(engine.rankKnowledge("clean sheet points", 5).map(entry => entry.id)).toEqual(["clean-sheet-points"]);
    expect(engine.rankKnowledge("tell me a joke", 5)).toEqual([]);

    const result = engine.retrieve(classify("what are the wildcard rules"), snapshot, 5);
    expect(result.intent).toBe("rules_knowledge");
    expect(result.knowledge.map(entry => entry.id)).toEqual(["wildcard"]);
  });

  it("filters differentials by ownership and ranks them by form", () => {
    const result = engine.retrieve(classify("best differentials"), snapshot, 3);
    expect(result.lens).toBe("differential");
    expect(result.sortKey).toBe("form");
    expect(result.totalMatched).toBe(7);
    expect(names(result)).toEqual(["Szoboszlai", "Bernardo", "Kulusevski"]);
  });

  it("limits captaincy picks to attackers and attaches the captaincy rules", () => {
    const result = engine.retrieve(classify("who should I captain"), snapshot, 3);
    expect(result.lens).toBe("captaincy");
    expect(names(result)).toEqual(["Haaland", "Salah", "Palmer"]);
    expect(result.knowledge.map(entry => entry.id)).toEqual(["captaincy"]);
  });

  it("compares mentioned players under a strategy lens", () => {
    const result = engine.retrieve(classify("should I sell Saka or Salah"), snapshot, 5);
    expect(result.intent).toBe("strategy_advice");
    expect(result.ranked.map(entry => [entry.entity.displayName, entry.value])).toEqual([
      ["Saka", 6.1],
      ["Salah", 7.5],
    ]);
  });

  it("falls back to lexical overlap for general queries", () => {
    const result = engine.retrieve(manual("general", {}, "gunners"), snapshot, 5);
    expect(result.totalMatched).toBe(6);
    expect(names(result)).toEqual(["Gabriel", "Martinelli", "Raya", "Rice", "Saka"]);

    expect(engine.retrieve(manual("general", {}, "hi"), snapshot, 5).totalMatched).toBe(0);
  });

  it("returns nothing for conversational turns", () => {
    const result = engine.retrieve(classify("hello"), snapshot, 5);
    expect(result).toMatchObject({ ranked: [], unavailable: [], ambiguous: [], notFound: [], fixtures: [], knowledge: [] });
  });
});
