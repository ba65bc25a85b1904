import { once } from "node:events";
import type { Server } from "node:http";
import express from "express";
import { AppError, asyncHandler, errorHandler } from "./errorHandler.js";

describe("errorHandler", () => {
  let server: Server | undefined;
  let baseUrl = "";
  const errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});

  beforeAll(async () => {
    const app = express();
    app.get(
      "/operational",
      asyncHandler(async () => {
        throw new AppError("Facility already exists", 409, { code: "conflict" });
      })
    );
    app.get(
      "/non-operational",
      asyncHandler(async () => {
        throw new AppError("pool exhausted", 500, { code: "db_error", isOperational: false });
      })
    );
    app.get("/teapot", () => {
      throw Object.assign(new Error("short and stout"), { status: 418 });
    });
    app.get("/boom", () => {
      throw new Error("kaboom");
    });
    app.use(errorHandler);

    const listening = app.listen(0, "127.0.0.1");
    await once(listening, "listening");
    server = listening;

    const address = listening.address();
    if (!address || typeof address === "string") throw new Error("server has no TCP address");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    const s = server;
    if (s) {
      await new Promise<void>((resolve, reject) => {
        s.close((err) => (err ? reject(err) : resolve()));
      });
    }
    errorSpy.mockRestore();
  });

  it("operational AppError keeps its status, message and code", async () => {
    const res = await fetch(`${baseUrl}/operational`);

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: "Facility already exists", code: "conflict" });
  });

  it("non-operational AppError is hidden outside development", async () => {
    const res = await fetch(`${baseUrl}/non-operational`);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Internal server error" });
  });

  it("honours a client status carried by the error", async () => {
    const res = await fetch(`${baseUrl}/teapot`);

    expect(res.status).toBe(418);
    expect(await res.json()).toEqual({ error: "Bad request", code: "bad_request" });
  });

  it("unknown errors are 500", async () => {
    const res = await fetch(`${baseUrl}/boom`);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "kaboom" });
  });
});
