import { Type } from "@sinclair/typebox";

import { createDispatcher } from "./dispatcher";
import { silentLogger } from "./logger";
import { TestClient } from "./test-client";
import { typedRoute } from "./typed-route";

const schema = Type.Object({
  age: Type.String({ pattern: "^[0-9]+$" }),
  tag: Type.Optional(Type.Array(Type.String())),
});

const createClient = () => {
  const app = createDispatcher({ logger: silentLogger() });
  app.route(
    "/typed",
    typedRoute(
      schema,
      (request, params) =>
        `age ${params.age} tags ${params.tag?.join("|") ?? "none"}`
    )
  );
  return new TestClient(app);
};

describe("typedRoute", () => {
  it("should hand validated params to the handler", async () => {
    const response = await createClient().get("/typed", {
      queryString: "age=25",
    });

    expect(response.statusCode).toBe(200);
    expect(response.data).toBe("age 25 tags none");
  });

  it("should accept repeated keys as arrays", async () => {
    const response = await createClient().get("/typed", {
      queryString: "age=7&tag=a&tag=b",
    });

    expect(response.data).toBe("age 7 tags a|b");
  });

  it("should answer 400 when a param fails its pattern", async () => {
    const response = await createClient().get("/typed", {
      queryString: "age=old",
    });

    expect(response.status).toBe("400 Bad Request");
    expect(response.data).toMatch(
      /^<h1>Error:<\/h1><p>Invalid query parameters: \/age: /
    );
  });

  it("should answer 400 when a required param is missing", async () => {
    const response = await createClient().get("/typed");

    expect(response.statusCode).toBe(400);
  });
});
