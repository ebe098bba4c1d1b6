import { createParamDecorator, ExecutionContext } from "@nestjs/common";
import { Request } from "express";

/**
 * Acting user id from the `userid` header. Resolves to undefined when the
 * header is missing or not a positive integer.
 */
export const GetUserId = createParamDecorator(
  (data: unknown, ctx: ExecutionContext): number | undefined => {
    const request = ctx.switchToHttp().getRequest<Request>();
    const header = request.headers["userid"];
    const raw = Array.isArray(header) ? header[0] : header;
    if (!raw || !/^\d+$/.test(raw.trim())) {
      return undefined;
    }
    const userId = parseInt(raw, 10);
    return userId > 0 ? userId : undefined;
  },
);
