export type RemoteService = "jira" | "gitlab";

export class AppError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends AppError {}

export class ApiError extends AppError {
  constructor(
    message: string,
    public readonly service: RemoteService,
    public readonly status: number | null,
    public readonly body: string = ""
  ) {
    super(message);
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string, service: RemoteService, body = "") {
    super(message, service, 404, body);
  }
}

export class AlreadyExistsError extends AppError {
  constructor(public readonly branchName: string) {
    super(`Branch already exists: ${branchName}`);
  }
}

export class TransitionNotFoundError extends AppError {
  constructor(
    public readonly issueKey: string,
    public readonly requestedStatus: string,
    public readonly available: string[]
  ) {
    super(
      `No transition to '${requestedStatus}' on ${issueKey}. Available: ${
        available.length > 0 ? available.map((name) => `'${name}'`).join(", ") : "(none)"
      }.`
    );
  }
}

export function formatError(error: unknown): string {
  if (error instanceof ApiError) {
    const body = error.body.trim();
    if (body) {
      return `${error.message}\n${error.service === "jira" ? "Jira" : "GitLab"} response body: ${body}`;
    }

    return error.message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
