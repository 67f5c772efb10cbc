export interface FieldError {
  path: string;
  message: string;
}

export type ProblemCode =
  | "INVALID_ARGUMENT"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "UNPROCESSABLE_ENTITY"
  | "NOT_FOUND"
  | "METHOD_NOT_ALLOWED"
  | "INTERNAL";

/** RFC 7807 problem document. */
export interface Problem {
  type: string;
  title: string;
  status: number;
  code: ProblemCode;
  detail?: string;
  instance?: string;
  requestId?: string;
  errors?: FieldError[];
}

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

const TITLES: Record<ProblemCode, string> = {
  INVALID_ARGUMENT: "Invalid argument",
  UNSUPPORTED_MEDIA_TYPE: "Unsupported media type",
  UNPROCESSABLE_ENTITY: "Unprocessable entity",
  NOT_FOUND: "Not found",
  METHOD_NOT_ALLOWED: "Method not allowed",
  INTERNAL: "Internal error",
};

export function problem(params: Omit<Problem, "type" | "title">): Problem {
  return {
    type: `https://errors.fuzzy-engine.local/${params.code.toLowerCase().replace(/_/g, "-")}`,
    title: TITLES[params.code],
    ...params,
  };
}
