export interface ErrorResponse {
  detail: string | RequestValidationDetail[];
}

export interface RequestValidationDetail {
  loc: (string | number)[];
  msg: string;
  type: string;
}

export interface HealthResponse {
  status: "healthy";
  api_key_exists: boolean;
}

export interface ServiceInfoResponse {
  message: string;
  version: string;
  endpoints: Record<string, string>;
}
