import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
} from "@nestjs/common";
import { Observable } from "rxjs";
import { tap } from "rxjs/operators";
import { Request, Response } from "express";
import { GENERATE_TOOL_NAME } from "../../grid/constants/tool-definition.constant";

const SLOW_REQUEST_MS = 1000;

const GENERATION_ROUTES = new Set(["/generate", `/tools/${GENERATE_TOOL_NAME}`]);

/**
 * Global logging interceptor for HTTP requests.
 *
 * Image generation is logged at info level; other routes only when slow
 * (>1000ms). Failed requests are logged by the exception filter.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger("HTTP");

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const { method, url, path, ip } = request;
    const startTime = Date.now();

    return next.handle().pipe(
      tap(() => {
        const { statusCode } = response;
        const responseTime = Date.now() - startTime;

        const isGenerate = method === "POST" && GENERATION_ROUTES.has(path);
        const isSlow = responseTime > SLOW_REQUEST_MS;

        if (isGenerate || isSlow) {
          const emoji = isSlow ? "🐌" : "🖼️";
          this.logger.log(
            `${emoji} ${method} ${url} ${statusCode} - ${responseTime}ms - ${ip}`,
          );
        }
      }),
    );
  }
}
