/**
 * Tests for the role-gated pause routes.
 */

import { describe, it, expect } from "vitest";
import { PAUSE_ROLE } from "@wtoken/types";
import { ADMIN, ALICE, createTestApp, postAs, readJson } from "../setup.js";

describe("POST /api/v1/admin/pause", () => {
  it("pauses for a PAUSE_ROLE holder", async () => {
    const { app, service } = createTestApp();
    const res = await app.request(postAs(ADMIN, "/api/v1/admin/pause"));

    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({ data: { pausedLocally: true } });
    expect(service.token.paused()).toBe(true);
  });

  it("returns 403 UNAUTHORIZED for anyone else", async () => {
    const { app, service } = createTestApp();
    const res = await app.request(postAs(ALICE, "/api/v1/admin/pause"));

    expect(res.status).toBe(403);
    expect(await readJson(res)).toMatchObject({
      error: { code: "UNAUTHORIZED", details: { account: ALICE, role: PAUSE_ROLE } },
    });
    expect(service.token.pausedLocally()).toBe(false);
  });

  it("is idempotent", async () => {
    const { app, service } = createTestApp();
    await app.request(postAs(ADMIN, "/api/v1/admin/pause"));
    const res = await app.request(postAs(ADMIN, "/api/v1/admin/pause"));

    expect(res.status).toBe(200);
    const paused = service.events().filter((r) => r.event.type === "Paused");
    expect(paused).toHaveLength(1);
  });
});

describe("POST /api/v1/admin/unpause", () => {
  it("lifts the local pause", async () => {
    const { app, service } = createTestApp();
    await app.request(postAs(ADMIN, "/api/v1/admin/pause"));
    const res = await app.request(postAs(ADMIN, "/api/v1/admin/unpause"));

    expect(await readJson(res)).toEqual({ data: { pausedLocally: false } });
    expect(service.token.paused()).toBe(false);
  });

  it("cannot lift a pause of the asset itself", async () => {
    const { app, service } = createTestApp();
    service.pauseAsset();
    await app.request(postAs(ADMIN, "/api/v1/admin/unpause"));

    expect(service.token.pausedLocally()).toBe(false);
    expect(service.token.paused()).toBe(true);
  });
});
