import { z } from "zod";

export class EnvError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(message: string, issues: z.ZodIssue[]) {
    super(message);
    this.name = "EnvError";
    this.issues = issues;
  }
}

const formatIssues = (issues: z.ZodIssue[]): string => {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
};

export const booleanFlag = (fallback: boolean) =>
  z
    .preprocess((value) => {
      if (typeof value === "string") {
        const normalized = value.trim().toLowerCase();
        if (["1", "true", "yes", "on"].includes(normalized)) {
          return true;
        }
        if (["0", "false", "no", "off"].includes(normalized)) {
          return false;
        }
      }
      return value;
    }, z.boolean())
    .default(fallback);

export const readEnv = <T extends z.ZodTypeAny>(
  schema: T,
  env: Record<string, string | undefined> = process.env
): z.infer<T> => {
  const result = schema.safeParse(env);

  if (!result.success) {
    const details = formatIssues(result.error.issues);
    throw new EnvError(`Invalid environment: ${details}`, result.error.issues);
  }

  return result.data;
};
