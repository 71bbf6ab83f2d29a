import { getAddress } from "viem";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  InvalidCallerError,
  InvalidTrainContextError,
  NotOwnerError,
  TokenNotFoundError,
} from "../src/errors";
import { MemoryOwnershipLedger } from "../src/ledger/ownershipLedger";
import { buildTokenUri, decodeImageUri, decodeTokenUri } from "../src/metadata/tokenUri";
import { ChainBattles } from "../src/registry/chainBattles";
import { advanceStats } from "../src/stats/advance";
import { FULL_BASELINE, type StatsVariant } from "../src/stats/types";
import { MemoryIdentifierIssuer } from "../src/storage/issuer";
import { MemoryStatStore } from "../src/storage/statStore";

const ALICE = "0x1111111111111111111111111111111111111111";
const BOB = "0x2222222222222222222222222222222222222222";
const MIXED_CASE = "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd";

function createRegistry(variant: StatsVariant = "full", now = 1_700_000_000n) {
  const store = new MemoryStatStore();
  const ledger = new MemoryOwnershipLedger();
  const registry = new ChainBattles({
    store,
    ledger,
    issuer: new MemoryIdentifierIssuer(),
    variant,
    clock: () => now,
  });
  return { registry, store, ledger };
}

describe("ChainBattles", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("mint", () => {
    it("issues sequential ids starting at 1", async () => {
      const { registry } = createRegistry();
      expect(await registry.mint(ALICE)).toBe(1);
      expect(await registry.mint(BOB)).toBe(2);
      expect(await registry.mint(ALICE)).toBe(3);
    });

    it("never hands the same id to concurrent mints", async () => {
      const { registry } = createRegistry();
      const ids = await Promise.all([ALICE, BOB, ALICE, BOB, ALICE].map((c) => registry.mint(c)));
      expect([...ids].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5]);
    });

    it("creates the baseline record and assigns ownership", async () => {
      const { registry } = createRegistry();
      const id = await registry.mint(ALICE);
      expect(await registry.stats(id)).toEqual(FULL_BASELINE);
      expect(await registry.ownerOf(id)).toBe(ALICE);
      expect(await registry.level(id)).toBe(0);
      expect(await registry.health(id)).toBe(10);
      expect(await registry.strength(id)).toBe(6);
      expect(await registry.speed(id)).toBe(3);
    });

    it("stores the level-zero metadata snapshot", async () => {
      const { registry } = createRegistry();
      await registry.mint(ALICE);
      const uri = await registry.tokenURI(1);
      expect(uri).toBe(buildTokenUri(1, FULL_BASELINE));

      const metadata = decodeTokenUri(uri);
      expect(metadata).toEqual({
        name: "Chain Battles #1",
        description: "Battles on chain",
        image: metadata.image,
        attributes: [
          { trait_type: "health", value: "10" },
          { trait_type: "strength", value: "6" },
          { trait_type: "speed", value: "3" },
        ],
      });
      expect(decodeImageUri(metadata.image)).toContain(">Levels: 0</text>");
    });

    it("stores owners in checksummed form", async () => {
      const { registry } = createRegistry();
      const id = await registry.mint(MIXED_CASE);
      expect(await registry.ownerOf(id)).toBe(getAddress(MIXED_CASE));
    });

    it("rejects a malformed caller without consuming an id", async () => {
      const { registry } = createRegistry();
      await expect(registry.mint("not-an-address")).rejects.toBeInstanceOf(InvalidCallerError);
      expect(await registry.mint(ALICE)).toBe(1);
    });

    it("uses the reduced record when configured", async () => {
      const { registry } = createRegistry("reduced");
      const id = await registry.mint(ALICE);
      expect(await registry.stats(id)).toEqual({ kind: "reduced", level: 0 });
      expect(await registry.health(id)).toBe(0);
      expect(decodeTokenUri(await registry.tokenURI(id)).attributes).toBeUndefined();
    });
  });

  describe("train", () => {
    it("advances the stats and replaces the snapshot", async () => {
      const { registry } = createRegistry();
      const id = await registry.mint(ALICE);
      const context = { timestamp: 1_690_000_000n };

      const updated = await registry.train(id, ALICE, context);

      expect(updated).toEqual(advanceStats(id, FULL_BASELINE, ALICE, context));
      expect(await registry.stats(id)).toEqual(updated);
      expect(await registry.tokenURI(id)).toBe(buildTokenUri(id, updated));
      const metadata = decodeTokenUri(await registry.tokenURI(id));
      expect(decodeImageUri(metadata.image)).toContain(">Levels: 1</text>");
    });

    it("falls back to the injected clock", async () => {
      const { registry } = createRegistry("full", 1_234_567n);
      const id = await registry.mint(ALICE);
      const updated = await registry.train(id, ALICE);
      expect(updated).toEqual(advanceStats(id, FULL_BASELINE, ALICE, { timestamp: 1_234_567n }));
    });

    it("gives the same result for the same inputs on separate registries", async () => {
      const first = createRegistry();
      const second = createRegistry();
      await first.registry.mint(BOB);
      await second.registry.mint(BOB);

      const context = { timestamp: 1_600_000_123n };
      const a = await first.registry.train(1, BOB, context);
      const b = await second.registry.train(1, BOB, context);

      expect(a).toEqual(b);
      expect(await first.registry.tokenURI(1)).toBe(await second.registry.tokenURI(1));
    });

    it("raises the level by exactly one per call", async () => {
      const { registry } = createRegistry();
      const id = await registry.mint(ALICE);
      for (let i = 1; i <= 5; i++) {
        const stats = await registry.train(id, ALICE, { timestamp: BigInt(1_000 + i) });
        expect(stats.level).toBe(i);
      }
      expect(await registry.getLevels(id)).toBe("5");
    });

    it("accepts the owner in another letter case", async () => {
      const { registry } = createRegistry();
      const id = await registry.mint(MIXED_CASE);
      const stats = await registry.train(id, MIXED_CASE.toUpperCase().replace("0X", "0x"), {
        timestamp: 5n,
      });
      expect(stats.level).toBe(1);
    });

    it("fails with NOT_FOUND for an id that was never minted", async () => {
      const { registry } = createRegistry();
      await registry.mint(ALICE);
      const attempt = registry.train(999, ALICE, { timestamp: 1n });
      await expect(attempt).rejects.toBeInstanceOf(TokenNotFoundError);
      await expect(registry.train(999, ALICE, { timestamp: 1n })).rejects.toMatchObject({
        code: "NOT_FOUND",
      });
      expect(await registry.stats(999)).toBeNull();
    });

    it("fails with NOT_OWNER for another caller and changes nothing", async () => {
      const { registry } = createRegistry();
      const id = await registry.mint(ALICE);
      const uriBefore = await registry.tokenURI(id);

      await expect(registry.train(id, BOB, { timestamp: 1n })).rejects.toBeInstanceOf(NotOwnerError);
      await expect(registry.train(id, BOB, { timestamp: 1n })).rejects.toMatchObject({
        code: "NOT_OWNER",
      });

      expect(await registry.stats(id)).toEqual(FULL_BASELINE);
      expect(await registry.tokenURI(id)).toBe(uriBefore);
    });

    it("rejects a negative timestamp without mutating", async () => {
      const { registry } = createRegistry();
      const id = await registry.mint(ALICE);
      await expect(registry.train(id, ALICE, { timestamp: -5n })).rejects.toBeInstanceOf(
        InvalidTrainContextError
      );
      expect(await registry.stats(id)).toEqual(FULL_BASELINE);
    });

    it("applies concurrent trains on one token one after another", async () => {
      const { registry } = createRegistry();
      const id = await registry.mint(ALICE);

      const results = await Promise.all(
        [1n, 2n, 3n].map((timestamp) => registry.train(id, ALICE, { timestamp }))
      );

      expect(results.map((s) => s.level)).toEqual([1, 2, 3]);
      expect(await registry.level(id)).toBe(3);
      const metadata = decodeTokenUri(await registry.tokenURI(id));
      expect(decodeImageUri(metadata.image)).toContain(">Levels: 3</text>");
    });

    it("only raises the level of a reduced record", async () => {
      const { registry } = createRegistry("reduced");
      const id = await registry.mint(ALICE);
      expect(await registry.train(id, ALICE, { timestamp: 10n })).toEqual({
        kind: "reduced",
        level: 1,
      });
    });
  });

  describe("tokenURI", () => {
    it("fails with NOT_FOUND for an unknown id", async () => {
      const { registry } = createRegistry();
      await expect(registry.tokenURI(1)).rejects.toBeInstanceOf(TokenNotFoundError);
    });

    it("keeps the last snapshot until the token is refreshed", async () => {
      const { registry, store } = createRegistry();
      const id = await registry.mint(ALICE);
      const minted = await registry.tokenURI(id);

      const edited = { kind: "full", level: 9, health: 50, strength: 20, speed: 8 } as const;
      await store.set(id, edited);
      expect(await registry.tokenURI(id)).toBe(minted);

      expect(await registry.refreshTokenUri(id)).toBe(buildTokenUri(id, edited));
      expect(await registry.tokenURI(id)).toBe(buildTokenUri(id, edited));
    });

    it("refuses to refresh a token that was never minted", async () => {
      const { registry } = createRegistry();
      await expect(registry.refreshTokenUri(3)).rejects.toBeInstanceOf(TokenNotFoundError);
    });
  });

  describe("stat readers", () => {
    it("answer 0 for unissued ids", async () => {
      const { registry } = createRegistry();
      expect(await registry.level(42)).toBe(0);
      expect(await registry.health(42)).toBe(0);
      expect(await registry.strength(42)).toBe(0);
      expect(await registry.speed(42)).toBe(0);
      expect(await registry.getLevels(42)).toBe("0");
      expect(await registry.stats(42)).toBeNull();
    });
  });
});

class BrokenUriLedger extends MemoryOwnershipLedger {
  failUriWrites = 0;

  async setUri(tokenId: number, uri: string): Promise<void> {
    if (this.failUriWrites > 0) {
      this.failUriWrites--;
      throw new Error("ledger down");
    }
    await super.setUri(tokenId, uri);
  }
}

class BrokenCreateStore extends MemoryStatStore {
  failCreates = 0;

  async create(tokenId: number, variant: StatsVariant) {
    if (this.failCreates > 0) {
      this.failCreates--;
      throw new Error("store down");
    }
    return super.create(tokenId, variant);
  }
}

describe("ChainBattles failed writes", () => {
  function createFragileRegistry() {
    const store = new BrokenCreateStore();
    const ledger = new BrokenUriLedger();
    const registry = new ChainBattles({ store, ledger, issuer: new MemoryIdentifierIssuer() });
    return { registry, store, ledger };
  }

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("restores the previous stats when the URI write of a train fails", async () => {
    const { registry, ledger } = createFragileRegistry();
    const id = await registry.mint(ALICE);
    const uriBefore = await registry.tokenURI(id);

    ledger.failUriWrites = 1;
    await expect(registry.train(id, ALICE, { timestamp: 7n })).rejects.toThrow("ledger down");

    expect(await registry.level(id)).toBe(0);
    expect(await registry.stats(id)).toEqual(FULL_BASELINE);
    expect(await registry.tokenURI(id)).toBe(uriBefore);

    const retried = await registry.train(id, ALICE, { timestamp: 7n });
    expect(retried).toEqual(advanceStats(id, FULL_BASELINE, ALICE, { timestamp: 7n }));
  });

  it("releases the ownership entry when the stat record cannot be created", async () => {
    const { registry, store, ledger } = createFragileRegistry();

    store.failCreates = 1;
    await expect(registry.mint(ALICE)).rejects.toThrow("store down");

    expect(await ledger.exists(1)).toBe(false);
    expect(await ledger.ownerOf(1)).toBeNull();
    expect(await registry.stats(1)).toBeNull();
    expect(await registry.mint(ALICE)).toBe(2);
  });

  it("removes the new record and ownership when the first URI write fails", async () => {
    const { registry, store, ledger } = createFragileRegistry();

    ledger.failUriWrites = 1;
    await expect(registry.mint(BOB)).rejects.toThrow("ledger down");

    expect(await ledger.exists(1)).toBe(false);
    expect(await store.get(1)).toBeNull();
    expect(await store.ids()).toEqual([]);
    await expect(registry.tokenURI(1)).rejects.toBeInstanceOf(TokenNotFoundError);
  });
});
