import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { HitIngestionService, parseHit } from "./hitIngestion";
import { MemoryParticipantStore } from "../store/memoryStore";
import { RateLimiter } from "../utils/memory";
import {
  ClientInputFault,
  RateLimitFault,
  StoreFault,
  StoreTimeoutError,
} from "../utils/data-helpers";
import type { IParticipant, IParticipantStore } from "../types";

const T0 = new Date("2026-03-01T10:00:00.000Z").getTime();
const ROLL = "2023001234";

const expectFault = (action: () => unknown, message: string, format: "json" | "text") => {
  try {
    action();
  } catch (error) {
    expect(error).toBeInstanceOf(ClientInputFault);
    expect(error).toMatchObject({ message, format, status: 400 });
    return;
  }
  throw new Error("expected a ClientInputFault");
};

describe("parseHit", () => {
  it.each([[undefined], ["a string"], [42], [[]], [[{ rollNumber: ROLL }]]])(
    "rejects a %j body as invalid input",
    (body: unknown) => {
      expectFault(() => parseHit(body), "Invalid input", "text");
    }
  );

  it.each([
    { rollNumber: 1234567890, name: "Asha", shot: 4 },
    { rollNumber: ROLL, name: ["Asha"], shot: 4 },
    { rollNumber: ROLL, name: "Asha", shot: "4" },
    { rollNumber: ROLL, name: "Asha", shot: 4.5 },
  ])("rejects mistyped fields in %j as invalid input", (body) => {
    expectFault(() => parseHit(body), "Invalid input", "text");
  });

  it("checks field types before the roll number format", () => {
    expectFault(
      () => parseHit({ rollNumber: "12", name: "Asha", shot: "six" }),
      "Invalid input",
      "text"
    );
  });

  it.each(["", "123456789", "12345678901", "12345abcde", " 1234567890", "1234567890\n", "١٢٣٤٥٦٧٨٩٠"])(
    "rejects roll number %j",
    (rollNumber) => {
      expectFault(
        () => parseHit({ rollNumber, name: "Asha", shot: 4 }),
        "Roll number must be exactly 10 digits",
        "json"
      );
    }
  );

  it("checks the roll number before the name", () => {
    expectFault(
      () => parseHit({ rollNumber: "42", name: "" }),
      "Roll number must be exactly 10 digits",
      "json"
    );
  });

  it("treats a missing roll number as empty", () => {
    expectFault(
      () => parseHit({ name: "Asha", shot: 4 }),
      "Roll number must be exactly 10 digits",
      "json"
    );
  });

  it("decodes a null body and null fields like missing ones", () => {
    expectFault(() => parseHit(null), "Roll number must be exactly 10 digits", "json");
    expectFault(
      () => parseHit({ rollNumber: null, name: "Asha", shot: 4 }),
      "Roll number must be exactly 10 digits",
      "json"
    );
    expectFault(
      () => parseHit({ rollNumber: ROLL, name: null, shot: 4 }),
      "Name is required",
      "json"
    );
    expect(parseHit({ rollNumber: ROLL, name: "Asha", shot: null })).toEqual({
      rollNumber: ROLL,
      name: "Asha",
      shot: 0,
    });
  });

  it("requires a name", () => {
    expectFault(() => parseHit({ rollNumber: ROLL, shot: 4 }), "Name is required", "json");
    expectFault(
      () => parseHit({ rollNumber: ROLL, name: "", shot: 4 }),
      "Name is required",
      "json"
    );
  });

  it("defaults a missing shot to zero and ignores unknown fields", () => {
    expect(parseHit({ rollNumber: ROLL, name: "Asha", team: "blue" })).toEqual({
      rollNumber: ROLL,
      name: "Asha",
      shot: 0,
    });
  });
});

describe("HitIngestionService", () => {
  let store: MemoryParticipantStore;
  let limiter: RateLimiter;
  let service: HitIngestionService;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(T0);
    store = new MemoryParticipantStore();
    limiter = new RateLimiter({ cooldownMs: 2000 });
    service = new HitIngestionService(store, limiter, 5000);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("creates a participant on the first shot", async () => {
    await service.recordHit({ rollNumber: ROLL, name: "Asha", shot: 6 });

    expect(await store.find(ROLL)).toEqual({
      rollNumber: ROLL,
      name: "Asha",
      score: 6,
      lastPlayed: new Date(T0),
    });
  });

  it("accumulates accepted shots", async () => {
    await service.recordHit({ rollNumber: ROLL, name: "Asha", shot: 4 });
    vi.setSystemTime(T0 + 2000);
    await service.recordHit({ rollNumber: ROLL, name: "Asha", shot: 6 });

    expect((await store.find(ROLL))?.score).toBe(10);
  });

  it("rejects a second shot inside the cooldown without touching the score", async () => {
    await service.recordHit({ rollNumber: ROLL, name: "Asha", shot: 4 });
    vi.setSystemTime(T0 + 1000);

    await expect(
      service.recordHit({ rollNumber: ROLL, name: "Asha", shot: 6 })
    ).rejects.toBeInstanceOf(RateLimitFault);
    expect((await store.find(ROLL))?.score).toBe(4);
  });

  it("does not extend the cooldown for rejected shots", async () => {
    await service.recordHit({ rollNumber: ROLL, name: "Asha", shot: 4 });
    vi.setSystemTime(T0 + 1500);
    await expect(
      service.recordHit({ rollNumber: ROLL, name: "Asha", shot: 1 })
    ).rejects.toBeInstanceOf(RateLimitFault);

    vi.setSystemTime(T0 + 2000);
    await service.recordHit({ rollNumber: ROLL, name: "Asha", shot: 1 });

    expect((await store.find(ROLL))?.score).toBe(5);
  });

  it("updates the name without resetting the score", async () => {
    await service.recordHit({ rollNumber: ROLL, name: "Asha", shot: 4 });
    vi.setSystemTime(T0 + 3000);
    await service.recordHit({ rollNumber: ROLL, name: "Asha K", shot: 0 });

    expect(await store.find(ROLL)).toEqual({
      rollNumber: ROLL,
      name: "Asha K",
      score: 4,
      lastPlayed: new Date(T0 + 3000),
    });
  });

  it("accepts negative shots", async () => {
    await service.recordHit({ rollNumber: ROLL, name: "Asha", shot: 4 });
    vi.setSystemTime(T0 + 2000);
    await service.recordHit({ rollNumber: ROLL, name: "Asha", shot: -6 });

    expect((await store.find(ROLL))?.score).toBe(-2);
  });

  it("rejects invalid input before the rate limiter or store see it", async () => {
    const write = vi.spyOn(store, "incrementScore");

    await expect(
      service.recordHit({ rollNumber: ROLL, name: "", shot: 4 })
    ).rejects.toBeInstanceOf(ClientInputFault);
    await expect(service.recordHit("not json")).rejects.toBeInstanceOf(ClientInputFault);

    expect(limiter.size).toBe(0);
    expect(write).not.toHaveBeenCalled();
  });

  it("throttles a concurrent resubmission while the first write is pending", async () => {
    const first = service.recordHit({ rollNumber: ROLL, name: "Asha", shot: 4 });
    const second = service.recordHit({ rollNumber: ROLL, name: "Asha", shot: 4 });

    await expect(second).rejects.toBeInstanceOf(RateLimitFault);
    await first;
    expect((await store.find(ROLL))?.score).toBe(4);
  });

  it("surfaces store failures as a store fault and keeps the throttle", async () => {
    const failure = new Error("connection reset");
    vi.spyOn(store, "incrementScore").mockRejectedValueOnce(failure);

    await expect(
      service.recordHit({ rollNumber: ROLL, name: "Asha", shot: 4 })
    ).rejects.toMatchObject({
      name: "StoreFault",
      message: "Error updating score",
      status: 500,
      storeError: failure,
    });
    expect(limiter.check(ROLL)).toBe(true);
  });
});

describe("HitIngestionService timeouts", () => {
  it("fails a write that outlives the store timeout", async () => {
    const stalled: IParticipantStore = {
      incrementScore: () => new Promise<void>(() => undefined),
      listByScore: async (): Promise<IParticipant[]> => [],
    };
    const service = new HitIngestionService(stalled, new RateLimiter(), 20);

    const error: unknown = await service
      .recordHit({ rollNumber: ROLL, name: "Asha", shot: 4 })
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(StoreFault);
    expect(error instanceof StoreFault && error.storeError).toBeInstanceOf(StoreTimeoutError);
  });
});
