import { afterEach, describe, expect, it, vi } from "vitest";
import { buildSnapshot, mapAvailability, teamName } from "./entityDictionary";
import { SnapshotIntegrityError } from "./errors";
import {
  SAMPLE_FETCHED_AT,
  buildSampleSnapshot,
  loadSampleBootstrap,
  loadSampleFixtures,
} from "./__fixtures__/sampleSnapshot";

describe("mapAvailability", () => {
  it("maps upstream status codes", () => {
    expect(mapAvailability("a")).toBe("Active");
    expect(mapAvailability("d")).toBe("Active");
    expect(mapAvailability("i")).toBe("Injured");
    expect(mapAvailability("n")).toBe("OnLoan");
    expect(mapAvailability("s")).toBe("Unavailable");
    expect(mapAvailability("u")).toBe("Unavailable");
  });
});

describe("buildSnapshot", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds persons, groups and fixtures from the payload", () => {
    const snapshot = buildSampleSnapshot(4);

    expect(snapshot.generationId).toBe(4);
    expect(snapshot.fetchedAt).toEqual(SAMPLE_FETCHED_AT);
    expect(snapshot.currentGameweek).toBe(10);
    expect(snapshot.persons).toHaveLength(19);
    expect(snapshot.groups).toHaveLength(5);
    expect(snapshot.fixtures).toHaveLength(8);
  });

  it("maps player fields", () => {
    const snapshot = buildSampleSnapshot();
    const haaland = snapshot.dictionary.personsById.get(5);
    expect(haaland).toMatchObject({
      displayName: "Haaland",
      fullName: "Erling Haaland",
      teamId: 2,
      position: "Forward",
      price: 150,
      status: "Active",
    });
    expect(haaland?.stats).toMatchObject({ points: 150, goals: 20, form: 8, ownershipPercent: 60.3 });

    const white = snapshot.dictionary.personsById.get(11);
    expect(white?.status).toBe("Injured");
    expect(white?.statusNote).toBe("Knee injury - Expected back 01 Dec");
  });

  it("indexes team aliases longest first with the canonical name leading", () => {
    const snapshot = buildSampleSnapshot();
    expect(snapshot.dictionary.teamAliases[0]).toEqual({ alias: "tottenham hotspur", groupId: 5 });
    expect(snapshot.dictionary.groupsById.get(2)?.aliases).toEqual([
      "man city",
      "manchester city",
      "city",
      "mcfc",
      "citizens",
      "cityzens",
    ]);
    expect(teamName(snapshot, 4)).toBe("Chelsea");
    expect(teamName(snapshot, 99)).toBe("Team 99");
  });

  it("freezes what it returns", () => {
    const snapshot = buildSampleSnapshot();
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.persons)).toBe(true);
    expect(Object.isFrozen(snapshot.persons[0])).toBe(true);
  });

  it("skips elements without a playing position", () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const bootstrap = loadSampleBootstrap();
    const [first] = bootstrap.elements;
    if (!first) throw new Error("sample bootstrap is empty");
    bootstrap.elements.push({ ...first, id: 500, web_name: "Manager", element_type: 5 });

    const snapshot = buildSnapshot({ bootstrap, fixtures: loadSampleFixtures(), generationId: 1 });
    expect(snapshot.dictionary.personsById.has(500)).toBe(false);
    expect(snapshot.persons).toHaveLength(19);
  });

  it("rejects persons and fixtures that reference unknown teams", () => {
    const bootstrap = loadSampleBootstrap();
    const [first] = bootstrap.elements;
    if (!first) throw new Error("sample bootstrap is empty");
    bootstrap.elements.push({ ...first, id: 99, team: 42 });
    const fixtures = loadSampleFixtures();
    const [firstFixture] = fixtures;
    if (!firstFixture) throw new Error("sample fixtures are empty");
    fixtures.push({ ...firstFixture, id: 900, team_h: 1, team_a: 77 });

    let caught: unknown;
    try {
      buildSnapshot({ bootstrap, fixtures, generationId: 1 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SnapshotIntegrityError);
    if (caught instanceof SnapshotIntegrityError) {
      expect(caught.violations).toEqual([
        "player 99 references unknown team 42",
        "fixture 900 references unknown team 77",
      ]);
    }
  });

  it("keeps the first team to claim a duplicate alias", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const snapshot = buildSnapshot({
      bootstrap: loadSampleBootstrap(),
      fixtures: loadSampleFixtures(),
      generationId: 1,
      aliasTable: { ARS: ["london"], CHE: ["london"] },
    });

    const london = snapshot.dictionary.teamAliases.filter(entry => entry.alias === "london");
    expect(london).toEqual([{ alias: "london", groupId: 1 }]);
    expect(warn).toHaveBeenCalledWith('[dictionary] Alias "london" already claimed; ignoring for Chelsea');
  });
});
