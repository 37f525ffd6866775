import { normalizeResult, Response } from "./response";

describe("Response", () => {
  it("should default to a 200 html response", () => {
    const response = new Response("hi");

    expect(response.status).toBe("200 OK");
    expect(response.statusCode).toBe(200);
    expect(response.headers).toEqual([["Content-Type", "text/html"]]);
    expect(response.body).toEqual(Buffer.from("hi"));
  });

  it("should encode strings as utf-8", () => {
    const response = new Response("héllo");

    expect(response.body.byteLength).toBe(6);
    expect(response.text()).toBe("héllo");
  });

  it("should build json responses", () => {
    const response = Response.json({ a: 1 });

    expect(response.status).toBe("200 OK");
    expect(response.header("content-type")).toBe("application/json");
    expect(JSON.parse(response.text())).toEqual({ a: 1 });
  });

  it("should encode undefined as json null", () => {
    const response = Response.json(undefined);

    expect(response.text()).toBe("null");
  });

  it("should build html responses with a status line", () => {
    const response = Response.html("<p>gone</p>", 404);

    expect(response.status).toBe("404 Not Found");
    expect(response.statusCode).toBe(404);
  });

  it("should replace headers case-insensitively", () => {
    const response = new Response("x").setHeader("content-type", "text/plain");

    expect(response.headers).toEqual([["content-type", "text/plain"]]);
  });

  it("should allow duplicate headers", () => {
    const response = new Response("x", "200 OK", [])
      .addHeader("Set-Cookie", "a=1")
      .addHeader("Set-Cookie", "b=2");

    expect(response.headers).toEqual([
      ["Set-Cookie", "a=1"],
      ["Set-Cookie", "b=2"],
    ]);
    expect(response.header("set-cookie")).toBe("a=1");
  });

  it("should replace the body", () => {
    const response = new Response("x").setBody(Uint8Array.from([1, 2]));

    expect(response.body).toEqual(Buffer.from([1, 2]));
  });
});

describe("normalizeResult", () => {
  it("should wrap strings in a default html response", () => {
    const response = normalizeResult("hello");

    expect(response.status).toBe("200 OK");
    expect(response.headers).toEqual([["Content-Type", "text/html"]]);
    expect(response.text()).toBe("hello");
  });

  it("should use bytes as the body", () => {
    const response = normalizeResult(Uint8Array.from([104, 105]));

    expect(response.status).toBe("200 OK");
    expect(response.body).toEqual(Buffer.from("hi"));
  });

  it("should pass responses through untouched", () => {
    const original = Response.json([1, 2], 201);

    expect(normalizeResult(original)).toBe(original);
    expect(original.status).toBe("201 Created");
  });
});
