import express, { type NextFunction, type Request, type Response } from "express";
import { PipelineInputSchema } from "@meeting-minutes/types";
import {
  AuthorizationError,
  describeError,
  handleOAuthCallback,
  searchAudioCandidates,
  type OAuthCallbackResponse,
} from "@meeting-minutes/core";
import type { AppContext } from "@meeting-minutes/runner";
import { dim, httpStatus } from "../output/index.js";

export interface ServerAppOptions {
  /** Told about every handled OAuth callback */
  onCallback?: (response: OAuthCallbackResponse) => void;
  /** Request log sink (default console.log) */
  log?: (line: string) => void;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Express 4 does not catch rejected handlers; forward them to the error middleware.
 */
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function queryParam(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function errorStatus(error: unknown): number {
  return error instanceof AuthorizationError && error.kind === "not_authorized" ? 401 : 500;
}

/**
 * HTTP surface: the OAuth redirect target plus a small JSON API.
 */
export function createServerApp(context: AppContext, options: ServerAppOptions = {}) {
  const log = options.log ?? console.log;
  const { authorizer } = context;
  const app = express();

  app.use(express.json());

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.on("finish", () => {
      log(`${dim(req.method)} ${req.path} ${httpStatus(res.statusCode)}`);
    });
    next();
  });

  app.get(
    "/oauth/callback",
    asyncRoute(async (req, res) => {
      const response = await handleOAuthCallback(authorizer, {
        code: queryParam(req.query.code),
        state: queryParam(req.query.state),
        error: queryParam(req.query.error),
      });
      res.on("finish", () => options.onCallback?.(response));
      res.status(response.statusCode).type("html").send(response.html);
    })
  );

  app.get(
    "/api/auth/status",
    asyncRoute(async (_req, res) => {
      const [setup, status] = await Promise.all([
        authorizer.checkDriveSetup(),
        authorizer.currentStatus(),
      ]);
      res.json({ setup, ...status });
    })
  );

  app.post(
    "/api/auth/start",
    asyncRoute(async (_req, res) => {
      res.json(await authorizer.startAuthorization());
    })
  );

  app.post(
    "/api/auth/reset",
    asyncRoute(async (_req, res) => {
      res.json(await authorizer.reset());
    })
  );

  app.get(
    "/api/drive/files",
    asyncRoute(async (_req, res) => {
      const api = await context.openDriveSession();
      res.json(await searchAudioCandidates(api));
    })
  );

  app.post(
    "/api/minutes",
    asyncRoute(async (req, res) => {
      const parsed = PipelineInputSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({
          error: "invalid_request",
          message: parsed.error.issues.map((issue) => issue.message).join("; "),
        });
        return;
      }

      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableFinished) {
          controller.abort();
        }
      });

      res.status(200).type("application/x-ndjson");
      for await (const event of context.runPipeline(parsed.data, controller.signal)) {
        if (controller.signal.aborted) break;
        res.write(`${JSON.stringify(event)}\n`);
      }
      res.end();
    })
  );

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = describeError(error);
    if (res.headersSent) {
      log(`Request failed after response started: ${message}`);
      res.end();
      return;
    }
    res.status(errorStatus(error)).json({ error: true, message });
  });

  return app;
}
