import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { AppContext } from "./common/context";
import { UpstreamError } from "./common/errors";
import { parseConfig } from "./configs/environment";
import { createServer } from "./server";
import { dietPlan, fenced, nutritionBreakdown, samRequest } from "./__fixtures__/aiResponses";

const generateText = vi.fn<(prompt: string) => Promise<string>>();

const context: AppContext = {
  config: parseConfig({ GOOGLE_API_KEY: "test-key" }),
  textGenerator: { generateText },
};

const app = createServer(context);

describe("service routes", () => {
  it("GET / describes the service", async () => {
    const res = await request(app).get("/");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      message: "AI Diet Plan & Nutrition API",
      version: "1.0.0",
      endpoints: {
        "/generate_diet_plan": "POST - Generate personalized diet plan",
        "/nutrition_breakdown": "POST - Analyze food nutrition",
        "/docs": "GET - API documentation",
      },
    });
  });

  it("GET /health reports the api key", async () => {
    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "healthy", api_key_exists: true });
  });

  it("serves the OpenAPI document built from the schemas", async () => {
    const res = await request(app).get("/openapi.json");

    expect(res.status).toBe(200);
    expect(res.body.info).toEqual({
      title: "AI Diet Plan & Nutrition API",
      description:
        "Generate personalized diet plans and nutritional breakdown using Google Gemini AI",
      version: "1.0.0",
    });
    expect(Object.keys(res.body.paths)).toEqual(["/generate_diet_plan", "/nutrition_breakdown"]);
    expect(
      res.body.paths["/generate_diet_plan"].post.requestBody.content["application/json"].schema
    ).toEqual({ $ref: "#/components/schemas/DietPlanRequest" });
    expect(
      res.body.paths["/nutrition_breakdown"].post.responses["200"].content["application/json"].schema
    ).toEqual({ $ref: "#/components/schemas/NutritionBreakdownResponse" });

    const dietPlanRequest = res.body.components.schemas.DietPlanRequest;
    expect(dietPlanRequest.properties.age.type).toBe("integer");
    expect(dietPlanRequest.required).toEqual([
      "name",
      "age",
      "goal",
      "height",
      "current_weight",
      "target_weight",
      "region",
      "cuisine_preference",
    ]);
    expect(res.body.components.schemas.DietPlanResponse.required).toEqual(["daily_plan"]);
  });

  it("serves the API documentation page", async () => {
    const res = await request(app).get("/docs/");

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toMatch(/^text\/html/);
    expect(res.text).toContain('<div id="swagger-ui"></div>');
  });

  it("answers unknown routes with 404", async () => {
    const res = await request(app).get("/unknown");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ detail: "Not Found" });
  });
});

describe("POST /generate_diet_plan", () => {
  beforeEach(() => {
    generateText.mockReset();
  });

  it("returns the validated plan", async () => {
    generateText.mockResolvedValue(fenced(dietPlan));

    const res = await request(app).post("/generate_diet_plan").send(samRequest);

    expect(res.status).toBe(200);
    expect(res.body).toEqual(dietPlan);
    expect(Number.isInteger(res.body.daily_plan.total_calories)).toBe(true);
    expect(res.body.daily_plan.total_calories).toBeGreaterThan(0);
    expect(Object.keys(res.body.daily_plan.meals)).toEqual(["breakfast", "lunch", "dinner"]);
    expect(generateText).toHaveBeenCalledTimes(1);
    expect(generateText.mock.calls[0][0]).toContain("- Name: Sam\n- Age: 30 years\n");
  });

  it("defaults missing list fields to empty", async () => {
    generateText.mockResolvedValue(JSON.stringify(dietPlan));
    const { health_conditions: _conditions, allergies: _allergies, ...body } = samRequest;

    const res = await request(app).post("/generate_diet_plan").send(body);

    expect(res.status).toBe(200);
    const prompt = generateText.mock.calls[0][0];
    expect(prompt).toContain("- Health Conditions: None\n");
    expect(prompt).toContain("- Allergies: None\n");
  });

  it("rejects an invalid body with 422 before calling the model", async () => {
    const { name: _name, ...body } = samRequest;

    const res = await request(app)
      .post("/generate_diet_plan")
      .send({ ...body, age: "thirty" });

    expect(res.status).toBe(422);
    expect(res.body.detail).toEqual([
      { loc: ["body", "name"], msg: "Required", type: "invalid_type" },
      { loc: ["body", "age"], msg: "Expected number, received string", type: "invalid_type" },
    ]);
    expect(generateText).not.toHaveBeenCalled();
  });

  it("rejects non-json bodies with 415", async () => {
    const res = await request(app)
      .post("/generate_diet_plan")
      .set("Content-Type", "text/plain")
      .send("name=Sam");

    expect(res.status).toBe(415);
    expect(res.body).toEqual({ detail: "Content-Type must be application/json" });
  });

  it("rejects malformed json with 400", async () => {
    const res = await request(app)
      .post("/generate_diet_plan")
      .set("Content-Type", "application/json")
      .send('{"name": ');

    expect(res.status).toBe(400);
    expect(typeof res.body.detail).toBe("string");
  });

  it("maps unparseable model output to 500", async () => {
    generateText.mockResolvedValue("I'm sorry, I can't help with that.");

    const res = await request(app).post("/generate_diet_plan").send(samRequest);

    expect(res.status).toBe(500);
    expect(res.body.detail.startsWith("Failed to parse AI response: ")).toBe(true);
  });

  it("maps schema mismatches to 500", async () => {
    const { snacks: _snacks, ...withoutSnacks } = dietPlan.daily_plan;
    generateText.mockResolvedValue(JSON.stringify({ daily_plan: withoutSnacks }));

    const res = await request(app).post("/generate_diet_plan").send(samRequest);

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      detail: "Invalid AI response structure: daily_plan.snacks: Required",
    });
  });

  it("maps upstream failures to 500", async () => {
    generateText.mockRejectedValue(new UpstreamError("quota exceeded"));

    const res = await request(app).post("/generate_diet_plan").send(samRequest);

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ detail: "Failed to generate diet plan: quota exceeded" });
  });
});

describe("POST /nutrition_breakdown", () => {
  const foods = [
    { item: "Rice", quantity: "200 gms" },
    { item: "Dal", quantity: "1 bowl" },
  ];

  beforeEach(() => {
    generateText.mockReset();
  });

  it("returns the validated breakdown", async () => {
    generateText.mockResolvedValue("```\n" + JSON.stringify(nutritionBreakdown) + "\n```");

    const res = await request(app).post("/nutrition_breakdown").send({ foods });

    expect(res.status).toBe(200);
    expect(res.body).toEqual(nutritionBreakdown);
    expect(generateText.mock.calls[0][0]).toContain("- Rice: 200 gms\n- Dal: 1 bowl\n");
  });

  it("accepts an empty food list", async () => {
    generateText.mockResolvedValue(
      JSON.stringify({
        meal_nutrition: { total_calories: 0, macros: { protein: 0, carbs: 0, fat: 0 }, breakdown: [] },
      })
    );

    const res = await request(app).post("/nutrition_breakdown").send({ foods: [] });

    expect(res.status).toBe(200);
    expect(res.body.meal_nutrition.breakdown).toEqual([]);
  });

  it("rejects foods without a quantity", async () => {
    const res = await request(app)
      .post("/nutrition_breakdown")
      .send({ foods: [{ item: "Rice" }] });

    expect(res.status).toBe(422);
    expect(res.body.detail).toEqual([
      { loc: ["body", "foods", 0, "quantity"], msg: "Required", type: "invalid_type" },
    ]);
  });

  it("passes parse errors through without the analysis prefix", async () => {
    generateText.mockResolvedValue('```json\n{"meal_nutrition": {"total_calories": 390,');

    const res = await request(app).post("/nutrition_breakdown").send({ foods });

    expect(res.status).toBe(500);
    expect(res.body.detail.startsWith("Failed to parse AI response: ")).toBe(true);
  });

  it("passes validation errors through without the analysis prefix", async () => {
    const { macros: _macros, ...withoutMacros } = nutritionBreakdown.meal_nutrition;
    generateText.mockResolvedValue(JSON.stringify({ meal_nutrition: withoutMacros }));

    const res = await request(app).post("/nutrition_breakdown").send({ foods });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      detail: "Invalid AI response structure: meal_nutrition.macros: Required",
    });
  });

  it("maps upstream failures to 500", async () => {
    generateText.mockRejectedValue(new UpstreamError("request timed out"));

    const res = await request(app).post("/nutrition_breakdown").send({ foods });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ detail: "Failed to analyze nutrition: request timed out" });
  });
});
