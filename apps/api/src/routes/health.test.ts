import { describe, expect, it } from "vitest";
import { buildHealthHandler } from "./health.js";

describe("GET /health", () => {
  it("returns ok with the number of live drafts", () => {
    let jsonBody: unknown = null;
    const res = {
      json(body: unknown) {
        jsonBody = body;
      }
    };

    buildHealthHandler({ listDrafts: () => ["d1", "d2"] })({}, res);
    expect(jsonBody).toEqual({ ok: true, service: "draft-room", drafts: 2 });
  });
});
