import { BattleMetricsNotFoundError, BattleMetricsResponseError } from "@sessionlink/errors";
import { afterEach, describe, expect, it } from "vitest";
import { BattleMetricsClient } from "../client.js";
import { calledUrl, createMockLogger, jsonResponse, mockFetchSequence } from "./helpers/mock-fetch.js";

function playerDocument() {
  return {
    data: { type: "player", id: "42", attributes: { name: "Scrap Baron" } },
    included: [
      {
        type: "server",
        id: "srv-2",
        attributes: { name: "Monthly Vanilla" },
        meta: { online: true, lastSeen: "2024-01-20T10:00:00Z" },
      },
      {
        type: "identifier",
        id: "ident-1",
        attributes: { type: "name" },
      },
      {
        type: "server",
        id: "srv-1",
        attributes: { name: "Weekly Solo" },
        meta: { online: false, lastSeen: "2024-01-05T10:00:00Z" },
      },
      {
        type: "server",
        id: "srv-broken",
        attributes: { name: "No meta" },
      },
    ],
  };
}

describe("player lookups", () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it("getPlayer returns the name and servers sorted by last seen", async () => {
    const fetchMock = mockFetchSequence(jsonResponse(playerDocument()));
    const logger = createMockLogger();
    const client = new BattleMetricsClient({ logger });

    const player = await client.getPlayer("42");

    const url = calledUrl(fetchMock, 0);
    expect(url.pathname).toBe("/players/42");
    expect(url.searchParams.get("include")).toBe("server");
    expect(player).toEqual({
      id: "42",
      name: "Scrap Baron",
      servers: [
        {
          id: "srv-1",
          name: "Weekly Solo",
          online: false,
          lastSeen: new Date("2024-01-05T10:00:00Z"),
        },
        {
          id: "srv-2",
          name: "Monthly Vanilla",
          online: true,
          lastSeen: new Date("2024-01-20T10:00:00Z"),
        },
      ],
    });
    expect(logger.warn).toHaveBeenCalledWith("Skipping malformed server srv-broken on player 42");
  });

  it("getRecentServers returns the last n servers", async () => {
    mockFetchSequence(jsonResponse(playerDocument()));
    const client = new BattleMetricsClient({ logger: createMockLogger() });

    const servers = await client.getRecentServers("42", 1);

    expect(servers.map((s) => s.id)).toEqual(["srv-2"]);
  });

  it("getRecentServers with n <= 0 makes no request", async () => {
    const fetchMock = mockFetchSequence();
    const client = new BattleMetricsClient({ logger: createMockLogger() });

    expect(await client.getRecentServers("42", 0)).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("getOnlineServer finds the server the player is on", async () => {
    mockFetchSequence(jsonResponse(playerDocument()));
    const client = new BattleMetricsClient({ logger: createMockLogger() });

    const server = await client.getOnlineServer("42");

    expect(server?.id).toBe("srv-2");
  });

  it("getOnlineServer returns null for an offline player", async () => {
    mockFetchSequence(
      jsonResponse({ data: { id: "7", attributes: { name: "Idle" } }, included: [] }),
    );
    const client = new BattleMetricsClient({ logger: createMockLogger() });

    expect(await client.getOnlineServer("7")).toBeNull();
  });

  it("getPlayer throws on an unknown player", async () => {
    mockFetchSequence(jsonResponse({ errors: [] }, 404));
    const client = new BattleMetricsClient({ logger: createMockLogger() });

    await expect(client.getPlayer("404")).rejects.toThrow(BattleMetricsNotFoundError);
  });

  it("getPlayer throws on a document without a name", async () => {
    mockFetchSequence(jsonResponse({ data: { id: "42", attributes: {} } }));
    const client = new BattleMetricsClient({ logger: createMockLogger() });

    await expect(client.getPlayer("42")).rejects.toThrow(BattleMetricsResponseError);
  });
});

describe("server lookups", () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it("getServer maps the server document", async () => {
    const fetchMock = mockFetchSequence(
      jsonResponse({
        data: {
          type: "server",
          id: "srv-1",
          attributes: {
            name: "Weekly Solo",
            ip: "203.0.113.5",
            port: 28015,
            players: 120,
            maxPlayers: 200,
            details: { rust_type: "official", rust_queued_players: 3 },
          },
        },
      }),
    );
    const client = new BattleMetricsClient({ logger: createMockLogger() });

    const server = await client.getServer("srv-1");

    expect(calledUrl(fetchMock, 0).pathname).toBe("/servers/srv-1");
    expect(server).toEqual({
      id: "srv-1",
      name: "Weekly Solo",
      ip: "203.0.113.5",
      port: 28015,
      players: 120,
      maxPlayers: 200,
      details: { rust_type: "official", rust_queued_players: 3 },
    });
  });

  it("getServer defaults missing details to an empty object", async () => {
    mockFetchSequence(
      jsonResponse({
        data: {
          id: "srv-3",
          attributes: { name: "Bare", ip: "203.0.113.9", port: 1, players: 0, maxPlayers: 10 },
        },
      }),
    );
    const client = new BattleMetricsClient({ logger: createMockLogger() });

    expect((await client.getServer("srv-3")).details).toEqual({});
  });
});
