/**
 * Tests for the event query route.
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_ADMIN_ROLE, PAUSE_ROLE, UPGRADE_ROLE, ZERO_ADDRESS } from "@wtoken/types";
import {
  ADMIN,
  ALICE,
  createTestApp,
  fund,
  postAs,
  readJson,
} from "../setup.js";

describe("GET /api/v1/events", () => {
  it("lists the startup records in order", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/events");

    expect(res.status).toBe(200);
    expect(await readJson(res)).toMatchObject({
      data: [
        { sequence: 1, event: { type: "RoleGranted", role: DEFAULT_ADMIN_ROLE, account: ADMIN, sender: ADMIN } },
        { sequence: 2, event: { type: "Initialized", version: 1 } },
        { sequence: 3, event: { type: "RoleGranted", role: PAUSE_ROLE, account: ADMIN } },
        { sequence: 4, event: { type: "RoleGranted", role: UPGRADE_ROLE, account: ADMIN } },
      ],
      pagination: { hasMore: false, nextAfterSequence: 4, lastSequence: 4 },
    });
  });

  it("encodes amounts as decimal strings", async () => {
    const { app } = createTestApp();
    await fund(app, ALICE, 50n);
    await app.request(postAs(ALICE, "/api/v1/vault/deposit", { assets: "50" }));

    const res = await app.request("/api/v1/events?afterSequence=4");
    expect(await readJson(res)).toMatchObject({
      data: [
        { sequence: 5, event: { type: "Transfer", from: ZERO_ADDRESS, to: ALICE, value: "50" } },
        {
          sequence: 6,
          event: { type: "Deposit", caller: ALICE, receiver: ALICE, assets: "50", shares: "50" },
        },
      ],
      pagination: { hasMore: false, nextAfterSequence: 6, lastSequence: 6 },
    });
  });

  it("pages with limit", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/events?afterSequence=1&limit=2");

    expect(await readJson(res)).toMatchObject({
      data: [{ sequence: 2 }, { sequence: 3 }],
      pagination: { hasMore: true, nextAfterSequence: 3, lastSequence: 4 },
    });
  });

  it("returns an empty page past the end", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/events?afterSequence=10");

    expect(await readJson(res)).toEqual({
      data: [],
      pagination: { hasMore: false, nextAfterSequence: null, lastSequence: 4 },
    });
  });

  it("filters by record type", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/events?type=RoleGranted&afterSequence=1&limit=1");

    expect(await readJson(res)).toMatchObject({
      data: [{ sequence: 3, event: { type: "RoleGranted", role: PAUSE_ROLE, account: ADMIN } }],
      pagination: { hasMore: true, nextAfterSequence: 3, lastSequence: 4 },
    });
  });

  it("rejects an unknown record type", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/events?type=Mint");

    expect(res.status).toBe(400);
  });

  it("rejects an out-of-range limit", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/events?limit=0");

    expect(res.status).toBe(400);
  });
});
