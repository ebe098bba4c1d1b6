import { v4 as uuidv4 } from "uuid";
import { HttpStatus } from "@nestjs/common";
import { Response } from "express";

// Response structure interface
export interface ServerResponse<T = unknown> {
  id: string;
  params: Params;
  responseCode: number;
  result: T;
  ts: string;
  ver: string;
}

export interface Params {
  resmsgid: string;
  err: string | null;
  status: "successful" | "failed";
  errmsg: string | null;
  successmessage: string | null;
}

export default class APIResponse {
  private static readonly API_VERSION = "1.0"; // Set version as a constant

  public static success<T>(
    response: Response,
    id: string,
    result: T,
    statusCode: HttpStatus = HttpStatus.OK,
    successmessage: string | null = null,
  ): Response {
    const body: ServerResponse<T> = {
      id,
      ver: APIResponse.API_VERSION,
      ts: new Date().toISOString(),
      params: {
        resmsgid: uuidv4(),
        status: "successful",
        err: null,
        errmsg: null,
        successmessage,
      },
      responseCode: statusCode,
      result,
    };
    return response.status(statusCode).json(body);
  }

  public static error(
    response: Response,
    id: string,
    errmsg: string,
    errorCode: string,
    statusCode: HttpStatus,
  ): Response {
    const body: ServerResponse<{ success: false }> = {
      id,
      ver: APIResponse.API_VERSION,
      ts: new Date().toISOString(),
      params: {
        resmsgid: uuidv4(),
        status: "failed",
        err: errorCode,
        errmsg,
        successmessage: null,
      },
      responseCode: statusCode,
      result: { success: false },
    };
    return response.status(statusCode).json(body);
  }
}
