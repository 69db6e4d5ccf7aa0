import { describe, it, expect, beforeAll } from "vitest";
import request from "supertest";
import { Application } from "express";
import { createApp } from "../src/app";
import { buildSubscriberInput, LOCATED_XML, UNLOCATED_XML } from "./fixtures/subscriber.fixture";

describe("Sh-Data routes", () => {
  let app: Application;

  beforeAll(async () => {
    app = await createApp();
  });

  describe("POST /api/v1/sh-data/render", () => {
    it("returns the rendered document as XML", async () => {
      const response = await request(app)
        .post("/api/v1/sh-data/render")
        .send(buildSubscriberInput())
        .expect(200);

      expect(response.headers["content-type"]).toMatch(/application\/xml/);
      expect(response.text).toBe(UNLOCATED_XML);
    });

    it("includes the location block for a located subscriber", async () => {
      const response = await request(app)
        .post("/api/v1/sh-data/render")
        .send(buildSubscriberInput({ servingNode: "mme01.example.org" }))
        .expect(200);

      expect(response.text).toBe(LOCATED_XML);
    });

    it("rejects a body without public identities", async () => {
      const response = await request(app)
        .post("/api/v1/sh-data/render")
        .send(buildSubscriberInput({ publicIdentities: [] }))
        .expect(400);

      expect(response.body).toEqual({
        error: "Validation failed",
        details: [{ field: "publicIdentities", message: "At least one public identity is required" }],
      });
    });

    it("answers 422 for values XML cannot carry", async () => {
      const response = await request(app)
        .post("/api/v1/sh-data/render")
        .send(buildSubscriberInput({ msisdn: "+1555\u0001" }))
        .expect(422);

      expect(response.body).toMatchObject({
        error: "Illegal XML character U+0001 in Sh-Data/PublicIdentifiers/MSISDN",
        code: "ENCODING_ERROR",
        path: "/api/v1/sh-data/render",
      });
    });

    it("answers 400 for an unknown extension", async () => {
      const response = await request(app)
        .post("/api/v1/sh-data/render?extensions=vendor-x")
        .send(buildSubscriberInput())
        .expect(400);

      expect(response.body).toMatchObject({
        error: "Unknown schema extension 'vendor-x'",
        code: "VALIDATION_ERROR",
      });
    });

    it("answers 400 for an extension listed twice", async () => {
      const response = await request(app)
        .post("/api/v1/sh-data/render?extensions=service-settings,service-settings")
        .send(buildSubscriberInput())
        .expect(400);

      expect(response.body).toMatchObject({
        error: "Schema extension 'service-settings' is listed more than once",
        code: "VALIDATION_ERROR",
      });
    });

    it("renders without vendor flags when the extension list is empty", async () => {
      const response = await request(app)
        .post("/api/v1/sh-data/render?extensions=")
        .send(buildSubscriberInput())
        .expect(200);

      expect(response.text).not.toContain("InboundCommunicationBarred");
    });

    it("echoes the request id", async () => {
      const response = await request(app)
        .post("/api/v1/sh-data/render")
        .set("X-Request-ID", "req-123")
        .send(buildSubscriberInput())
        .expect(200);

      expect(response.headers["x-request-id"]).toBe("req-123");
    });
  });

  describe("schema endpoints", () => {
    it("lists the field policy table of the configured schema", async () => {
      const response = await request(app).get("/api/v1/sh-data/schema/fields").expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.count).toBe(23);
      expect(response.body.data[1]).toEqual({
        path: "Sh-Data/IMSPrivateUserIdentity",
        kind: "leaf",
        presence: "required",
        conditional: false,
      });
    });

    it("rejects a repeated extensions parameter", async () => {
      const response = await request(app)
        .get("/api/v1/sh-data/schema/fields?extensions=a&extensions=b")
        .expect(400);

      expect(response.body.error).toBe("Query parameter 'extensions' must be a comma-separated list");
    });

    it("clears the schema cache", async () => {
      await request(app).delete("/api/v1/sh-data/schema/cache").expect(200);
      await request(app).get("/api/v1/sh-data/schema/fields").expect(200);

      const cleared = await request(app).delete("/api/v1/sh-data/schema/cache").expect(200);
      expect(cleared.body).toEqual({ success: true, invalidated: 1 });

      const stats = await request(app).get("/api/v1/sh-data/schema/cache").expect(200);
      expect(stats.body.data.totalCached).toBe(0);
    });
  });

  describe("health", () => {
    it("reports liveness", async () => {
      const response = await request(app).get("/health/live").expect(200);

      expect(response.body).toEqual({ status: "alive", timestamp: expect.any(String) });
    });

    it("reports readiness once the configured schema composes", async () => {
      const response = await request(app).get("/health/ready").expect(200);

      expect(response.body.status).toBe("ready");
      expect(response.body.checks.schema).toBe("base+service-settings");
    });

    it("answers 404 for unknown routes", async () => {
      const response = await request(app).get("/api/v1/unknown").expect(404);

      expect(response.body).toEqual({ error: "Route not found", path: "/api/v1/unknown" });
    });
  });
});
