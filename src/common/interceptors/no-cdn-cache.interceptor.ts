import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from "@nestjs/common";
import { Observable } from "rxjs";
import { tap } from "rxjs/operators";
import { Response } from "express";

/**
 * No CDN Cache Interceptor
 *
 * Generated images depend on the request body and on the current time
 * (the "now" marker), so neither browsers nor shared caches may keep them.
 *
 * Sets: Cache-Control: private, no-store, no-cache, must-revalidate
 */
@Injectable()
export class NoCdnCacheInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const response = context.switchToHttp().getResponse<Response>();

    return next.handle().pipe(
      tap(() => {
        response.setHeader(
          "Cache-Control",
          "private, no-store, no-cache, must-revalidate",
        );
        response.setHeader("Pragma", "no-cache");
      }),
    );
  }
}
