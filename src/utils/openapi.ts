import {
  OpenAPIRegistry,
  OpenApiGeneratorV3,
  extendZodWithOpenApi,
} from "@asteasolutions/zod-to-openapi";
import { z } from "zod";
import {
  dietPlanResponseSchema,
  generateDietPlanSchema,
} from "../validators/diet-plan.validator";
import {
  nutritionBreakdownSchema,
  nutritionResponseSchema,
} from "../validators/nutrition.validator";
import { SERVICE_INFO } from "./constants";

extendZodWithOpenApi(z);

const errorSchema = z.object({ detail: z.string() });

const requestValidationSchema = z.object({
  detail: z.array(
    z.object({
      loc: z.array(z.union([z.string(), z.number()])),
      msg: z.string(),
      type: z.string(),
    })
  ),
});

const jsonContent = (schema: z.ZodTypeAny) => ({
  content: { "application/json": { schema } },
});

const registerPipelinePath = (
  registry: OpenAPIRegistry,
  path: string,
  summary: string,
  body: z.ZodTypeAny,
  response: z.ZodTypeAny
) =>
  registry.registerPath({
    method: "post",
    path,
    summary,
    request: { body: { required: true, ...jsonContent(body) } },
    responses: {
      200: { description: "Successful Response", ...jsonContent(response) },
      415: { description: "Body is not JSON", ...jsonContent(errorSchema) },
      422: { description: "Validation Error", ...jsonContent(requestValidationSchema) },
      500: { description: "Model call, parsing or validation failed", ...jsonContent(errorSchema) },
    },
  });

/**
 * OpenAPI 3 document for the two generation endpoints, built from the same
 * zod schemas the routes validate with.
 */
export const buildOpenApiDocument = () => {
  const registry = new OpenAPIRegistry();

  const dietPlanRequest = registry.register("DietPlanRequest", generateDietPlanSchema.body);
  const dietPlanResponse = registry.register("DietPlanResponse", dietPlanResponseSchema);
  const nutritionRequest = registry.register("NutritionRequest", nutritionBreakdownSchema.body);
  const nutritionResponse = registry.register("NutritionBreakdownResponse", nutritionResponseSchema);

  registerPipelinePath(
    registry,
    "/generate_diet_plan",
    "Generate personalized diet plan",
    dietPlanRequest,
    dietPlanResponse
  );
  registerPipelinePath(
    registry,
    "/nutrition_breakdown",
    "Analyze food nutrition",
    nutritionRequest,
    nutritionResponse
  );

  return new OpenApiGeneratorV3(registry.definitions).generateDocument({
    openapi: "3.0.0",
    info: {
      title: SERVICE_INFO.NAME,
      description: SERVICE_INFO.DESCRIPTION,
      version: SERVICE_INFO.VERSION,
    },
  });
};
