import type { ZodIssue } from "zod";

import { projectionParametersSchema } from "./schema";
import { ProjectionParameters } from "./types";

export class ProjectionPreconditionError extends Error {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    const summary = issues
      .map((issue) => `${issue.path.join(".") || "parameters"}: ${issue.message}`)
      .join("; ");
    super(`Invalid projection parameters (${summary})`);
    this.name = "ProjectionPreconditionError";
    this.issues = issues;
  }
}

export const assertProjectionParameters = (parameters: ProjectionParameters): void => {
  const result = projectionParametersSchema.safeParse(parameters);
  if (!result.success) {
    throw new ProjectionPreconditionError(result.error.issues);
  }
};
