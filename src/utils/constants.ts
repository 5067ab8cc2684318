export const SERVICE_INFO = {
  NAME: "AI Diet Plan & Nutrition API",
  DESCRIPTION:
    "Generate personalized diet plans and nutritional breakdown using Google Gemini AI",
  VERSION: "1.0.0",
} as const;

export const ENDPOINTS = {
  "/generate_diet_plan": "POST - Generate personalized diet plan",
  "/nutrition_breakdown": "POST - Analyze food nutrition",
  "/docs": "GET - API documentation",
} as const;

// Characters of a failed model reply kept for logs and ParseError
export const RESPONSE_SNIPPET_LENGTH = 500;
