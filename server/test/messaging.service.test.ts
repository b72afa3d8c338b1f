import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest";
import fs from "fs";
import http from "http";
import path from "path";
import { WahaService, toChatId } from "../src/services/messaging.service";
import { DeliveryError } from "../src/models/errors";
import { close, listen, makeTempDir } from "./helpers";

interface CapturedRequest {
  method?: string;
  url?: string;
  apiKey?: string | string[];
  body: unknown;
}

describe("toChatId", () => {
  it("should append the contact suffix to bare numbers", () => {
    expect(toChatId("15551234567")).toBe("15551234567@c.us");
    expect(toChatId("123-456@g.us")).toBe("123-456@g.us");
  });
});

describe("WahaService", () => {
  let server: http.Server;
  let baseUrl: string;
  let requests: CapturedRequest[];
  let status: number;
  let waha: WahaService;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on("data", (chunk: Buffer) => chunks.push(chunk));
      req.on("end", () => {
        const raw = Buffer.concat(chunks).toString("utf8");
        requests.push({
          method: req.method,
          url: req.url,
          apiKey: req.headers["x-api-key"],
          body: raw ? JSON.parse(raw) : null,
        });
        res.writeHead(status, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ ok: status < 400 }));
      });
    });
    baseUrl = await listen(server);
  });

  afterAll(async () => {
    await close(server);
  });

  beforeEach(() => {
    requests = [];
    status = 201;
    waha = new WahaService({ baseUrl, sessionName: "default", apiKey: "test-secret" });
  });

  it("should send text messages", async () => {
    await waha.send("15551234567", { kind: "text", content: "hello" });

    expect(requests).toEqual([
      {
        method: "POST",
        url: "/api/sendText",
        apiKey: "test-secret",
        body: { chatId: "15551234567@c.us", text: "hello", session: "default" },
      },
    ]);
  });

  it("should send links with a preview", async () => {
    await waha.send("15551234567@c.us", {
      kind: "link",
      content: { url: "https://cloud.test/x.mp4", text: "✅ Clip\nhttps://cloud.test/x.mp4" },
    });

    expect(requests[0].url).toBe("/api/sendText");
    expect(requests[0].body).toEqual({
      chatId: "15551234567@c.us",
      text: "✅ Clip\nhttps://cloud.test/x.mp4",
      linkPreview: true,
      session: "default",
    });
  });

  it("should send files as base64", async () => {
    const dir = await makeTempDir();
    const filePath = path.join(dir, "clip.mp4");
    await fs.promises.writeFile(filePath, "abc");

    try {
      await waha.send("15551234567", {
        kind: "file",
        content: { path: filePath, filename: "clip.mp4", mimetype: "video/mp4", caption: "Clip" },
      });
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }

    expect(requests[0].url).toBe("/api/sendFile");
    expect(requests[0].body).toEqual({
      chatId: "15551234567@c.us",
      file: { mimetype: "video/mp4", filename: "clip.mp4", data: "YWJj" },
      caption: "Clip",
      session: "default",
    });
  });

  it("should classify a rejected send", async () => {
    status = 500;

    const error = await waha.send("15551234567", { kind: "text", content: "hello" }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(DeliveryError);
    expect(error).toMatchObject({ kind: "transport_rejected", statusCode: 500 });
  });

  it("should classify an unreachable gateway", async () => {
    const closed = http.createServer();
    const closedUrl = await listen(closed);
    await close(closed);

    const unreachable = new WahaService({ baseUrl: closedUrl, sessionName: "default" });
    await expect(
      unreachable.send("15551234567", { kind: "text", content: "hello" }),
    ).rejects.toMatchObject({ kind: "recipient_unreachable" });
  });

  it("should report gateway health", async () => {
    await expect(waha.healthCheck()).resolves.toBe(false);
    status = 200;
    await expect(waha.healthCheck()).resolves.toBe(true);
    expect(requests.map((r) => r.url)).toEqual(["/ping", "/ping"]);
  });
});
