/**
 * サーバーテスト（一時ディレクトリの DB / アップロード先で app を組み立てる）
 */
import fs from "fs";
import os from "os";
import path from "path";
import request from "supertest";
import Database from "better-sqlite3";

import { loadConfig, type AppConfig } from "../../lib/env.js";
import { LabelStore } from "../../store/labels.js";
import { UploadStore } from "../../features/uploads.js";
import { createApp } from "../server.js";

const cleanups: Array<() => void> = [];

function makeApp(overrides: Partial<AppConfig> = {}) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "label-server-"));
  const config: AppConfig = {
    ...loadConfig({}),
    databaseFile: path.join(dir, "labels.db"),
    uploadDir: path.join(dir, "uploads"),
    publicDir: path.resolve(process.cwd(), "public"),
    publicBaseUrl: "",
    ...overrides,
  };
  const store = new LabelStore(config.databaseFile);
  store.init();
  const uploads = new UploadStore(config.uploadDir);
  cleanups.push(() => {
    store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });
  return { app: createApp({ config, store, uploads }), store, config };
}

afterEach(() => {
  while (cleanups.length) cleanups.pop()?.();
});

describe("pages", () => {
  test("GET / serves the submission form", async () => {
    const { app } = makeApp();
    const res = await request(app).get("/");
    expect(res.status).toBe(200);
    expect(res.type).toBe("text/html");
    expect(res.text).toContain('<form id="label-form">');
  });

  test("health returns ok with the label count", async () => {
    const { app, store } = makeApp();
    store.create("h0000001", { title: "One" });
    const res = await request(app).get("/healthz");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, labels: 1 });
  });

  test("unknown routes render the not-found page", async () => {
    const { app } = makeApp();
    const res = await request(app).get("/no/such/page");
    expect(res.status).toBe(404);
    expect(res.text).toContain("<code>N/A</code>");
  });
});

describe("POST /api/create_label", () => {
  test("creates a label and the viewer renders the chosen template", async () => {
    const { app } = makeApp();
    const created = await request(app).post("/api/create_label").send({ title: "Vase", template: "gallery" });
    expect(created.status).toBe(201);
    expect(created.body.message).toBe("Exhibit label data successfully saved.");
    expect(created.body.label_id).toMatch(/^[0-9a-f]{8}$/);
    expect(created.body.url).toBe(`/exhibit/${created.body.label_id}`);

    const page = await request(app).get(created.body.url);
    expect(page.status).toBe(200);
    expect(page.text).toContain('data-template="gallery"');
    expect(page.text).toContain('<h1 class="label-title">Vase</h1>');
    expect(page.text).toContain('<img src="data:image/png;base64,');
  });

  test("the stored document round-trips through the api", async () => {
    const { app } = makeApp();
    const doc = { title: "Clock", template: "timeline", events: [{ date: "1750", title: "Made" }], weight_kg: 4.5 };
    const created = await request(app).post("/api/create_label").send(doc);
    const res = await request(app).get(`/api/labels/${created.body.label_id}`);
    expect(res.status).toBe(200);
    expect(res.body.label_id).toBe(created.body.label_id);
    expect(res.body.data).toEqual(doc);
  });

  test("missing body is a 400", async () => {
    const { app } = makeApp();
    const res = await request(app).post("/api/create_label");
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "No JSON data provided in request body." });
  });

  test("empty object and arrays are rejected", async () => {
    const { app } = makeApp();
    const empty = await request(app).post("/api/create_label").send({});
    expect(empty.status).toBe(400);
    const list = await request(app).post("/api/create_label").send([1, 2]);
    expect(list.status).toBe(400);
    expect(list.body).toEqual({ error: "No JSON data provided in request body." });
  });

  test("malformed JSON is a 400", async () => {
    const { app } = makeApp();
    const res = await request(app)
      .post("/api/create_label")
      .set("Content-Type", "application/json")
      .send("{bad json");
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Malformed JSON body." });
  });

  test("storage failures are a 500 without internals", async () => {
    const { app, store } = makeApp();
    store.close();
    const res = await request(app).post("/api/create_label").send({ title: "Vase" });
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "Internal server error during data processing." });
  });
});

describe("GET /exhibit/:label_id", () => {
  test("unknown id renders the not-found page", async () => {
    const { app } = makeApp();
    const res = await request(app).get("/exhibit/doesnotexist");
    expect(res.status).toBe(404);
    expect(res.text).toContain("Exhibit not found");
    expect(res.text).toContain("<code>doesnotexist</code>");
  });

  test("unknown template falls back to minimalist", async () => {
    const { app, store } = makeApp();
    store.create("plain001", { title: "Bowl", template: "poster" });
    const res = await request(app).get("/exhibit/plain001");
    expect(res.status).toBe(200);
    expect(res.text).toContain('data-template="minimalist"');
  });

  test("sidebar lists every exhibit and marks the current one", async () => {
    const { app, store } = makeApp();
    store.create("side0001", { title: "Vase" });
    store.create("side0002", { title: "Bowl" });
    const res = await request(app).get("/exhibit/side0001");
    expect(res.text).toContain('<li class="current"><a href="/exhibit/side0001">Vase</a>');
    expect(res.text).toContain('<li><a href="/exhibit/side0002">Bowl</a>');
  });

  test("qr link uses PUBLIC_BASE_URL when set", async () => {
    const { app, store } = makeApp({ publicBaseUrl: "https://labels.test" });
    store.create("qr000001", { title: "Vase" });
    const res = await request(app).get("/exhibit/qr000001");
    expect(res.text).toContain('<a href="https://labels.test/exhibit/qr000001">');
  });

  test("qr link falls back to the request host", async () => {
    const { app, store } = makeApp();
    store.create("qr000002", { title: "Vase" });
    const res = await request(app).get("/exhibit/qr000002").set("Host", "museum.test");
    expect(res.text).toContain('<a href="http://museum.test/exhibit/qr000002">');
  });

  test("a corrupt row is a 500 page, not a 404", async () => {
    const { app, config } = makeApp();
    const raw = new Database(config.databaseFile);
    raw.prepare("INSERT INTO labels (id, data) VALUES (?, ?)").run("bad00001", "{oops");
    raw.close();
    const res = await request(app).get("/exhibit/bad00001");
    expect(res.status).toBe(500);
    expect(res.text).toContain("Something went wrong");
  });

  test("legacy /label path redirects to the viewer", async () => {
    const { app } = makeApp();
    const res = await request(app).get("/label/abcd1234");
    expect(res.status).toBe(301);
    expect(res.headers.location).toBe("/exhibit/abcd1234");
  });
});

describe("label listing and deletion", () => {
  test("GET /api/labels summarizes every label", async () => {
    const { app, store } = makeApp();
    store.create("list0001", { title: "Vase", template: "gallery" });
    store.create("list0002", { description: "no title" });
    const res = await request(app).get("/api/labels");
    expect(res.status).toBe(200);
    expect(res.body.labels).toHaveLength(2);
    expect(res.body.labels[0]).toMatchObject({ label_id: "list0001", title: "Vase", template: "gallery", url: "/exhibit/list0001" });
    expect(res.body.labels[1]).toMatchObject({ label_id: "list0002", title: "Untitled exhibit", template: "minimalist" });
  });

  test("GET /api/labels/:id is 404 for unknown ids", async () => {
    const { app } = makeApp();
    const res = await request(app).get("/api/labels/nothere1");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Label not found." });
  });

  test("DELETE removes the label once", async () => {
    const { app, store } = makeApp();
    store.create("del00001", { title: "Vase" });
    const first = await request(app).delete("/api/delete_label/del00001");
    expect(first.status).toBe(200);
    expect(first.body).toEqual({ message: "Label del00001 deleted." });

    const second = await request(app).delete("/api/delete_label/del00001");
    expect(second.status).toBe(404);
    expect(second.body).toEqual({ error: "Label not found." });

    const page = await request(app).get("/exhibit/del00001");
    expect(page.status).toBe(404);
  });
});

describe("uploads", () => {
  test("accepts an allowed file and serves it back", async () => {
    const { app } = makeApp();
    const up = await request(app).post("/api/upload").attach("file", Buffer.from("fake-png-bytes"), "photo.png");
    expect(up.status).toBe(200);
    expect(up.body.success).toBe(true);
    expect(up.body.filename).toMatch(/^[0-9a-f]{32}_photo\.png$/);
    expect(up.body.media_uri).toBe(`/uploads/${up.body.filename}`);

    const file = await request(app).get(up.body.media_uri);
    expect(file.status).toBe(200);
    expect(file.type).toBe("image/png");
    expect(Buffer.isBuffer(file.body)).toBe(true);
    expect(file.body.toString("utf8")).toBe("fake-png-bytes");
  });

  test("identical names give distinct files", async () => {
    const { app } = makeApp();
    const a = await request(app).post("/api/upload").attach("file", Buffer.from("a"), "same.jpg");
    const b = await request(app).post("/api/upload").attach("file", Buffer.from("b"), "same.jpg");
    expect(a.status).toBe(200);
    expect(b.status).toBe(200);
    expect(a.body.media_uri).not.toBe(b.body.media_uri);
  });

  test("disallowed extension is a 400", async () => {
    const { app } = makeApp();
    const res = await request(app).post("/api/upload").attach("file", Buffer.from("MZ"), "setup.exe");
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "File type not allowed" });
  });

  test("multipart without a file part is a 400", async () => {
    const { app } = makeApp();
    const res = await request(app).post("/api/upload").field("title", "Vase");
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "No file part" });
  });

  test("a non-multipart body is a 400", async () => {
    const { app } = makeApp();
    const res = await request(app).post("/api/upload").send({ file: "photo.png" });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "No file part" });
  });

  test("files over the size limit are a 413", async () => {
    const { app, config } = makeApp({ uploadMaxBytes: 10 });
    const res = await request(app).post("/api/upload").attach("file", Buffer.alloc(64, 1), "big.png");
    expect(res.status).toBe(413);
    expect(res.body).toEqual({ error: "File too large" });
    expect(fs.existsSync(config.uploadDir) ? fs.readdirSync(config.uploadDir) : []).toEqual([]);
  });

  test("a non-ASCII filename is read as UTF-8", async () => {
    const { app } = makeApp();
    const res = await request(app).post("/api/upload").attach("file", Buffer.from("img"), "café.png");
    expect(res.status).toBe(200);
    expect(res.body.filename).toMatch(/^[0-9a-f]{32}_cafe\.png$/);
  });

  test("a body cut off mid-file is a 400 and the server keeps answering", async () => {
    const { app, config } = makeApp();
    const truncated =
      "--XYZ\r\n" +
      'Content-Disposition: form-data; name="file"; filename="a.png"\r\n' +
      "Content-Type: image/png\r\n\r\n" +
      "partial";
    const res = await request(app)
      .post("/api/upload")
      .set("Content-Type", "multipart/form-data; boundary=XYZ")
      .send(truncated);
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Malformed multipart body" });
    expect(fs.existsSync(config.uploadDir) ? fs.readdirSync(config.uploadDir) : []).toEqual([]);

    const health = await request(app).get("/healthz");
    expect(health.status).toBe(200);
  });

  test("a body without the closing boundary is a 400", async () => {
    const { app } = makeApp();
    const res = await request(app)
      .post("/api/upload")
      .set("Content-Type", "multipart/form-data; boundary=XYZ")
      .send('--XYZ\r\nContent-Disposition: form-data; name="title"\r\n\r\nVase\r\n');
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Malformed multipart body" });
  });

  test("missing or escaping upload names are 404", async () => {
    const { app } = makeApp();
    const missing = await request(app).get("/uploads/missing.png");
    expect(missing.status).toBe(404);
    const escaping = await request(app).get("/uploads/..%2F..%2Fpackage.json");
    expect(escaping.status).toBe(404);
  });

  test("deleting a label leaves its media in place", async () => {
    const { app } = makeApp();
    const up = await request(app).post("/api/upload").attach("file", Buffer.from("img"), "vase.gif");
    const created = await request(app)
      .post("/api/create_label")
      .send({ title: "Vase", media_uri: up.body.media_uri });
    await request(app).delete(`/api/delete_label/${created.body.label_id}`).expect(200);
    const file = await request(app).get(up.body.media_uri);
    expect(file.status).toBe(200);
  });
});
