import type { ZodIssue } from "zod";

export function formatIssueLocation(issue: ZodIssue): string {
  return issue.path.length > 0 ? issue.path.join(".") : "<root>";
}

export function formatSchemaIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = formatIssueLocation(issue);

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "invalid_enum_value") {
      const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
      return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}
