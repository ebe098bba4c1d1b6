import { LoggerUtil } from "../../common/logger/LoggerUtil";
import {
  DynamicFieldError,
  StorageError,
  errorMessage,
} from "../errors/dynamic-field.errors";

/**
 * Runs a persistence step. Domain errors pass through untouched; anything
 * else is logged and rethrown as a StorageError carrying the operation name.
 */
export async function withStorage<T>(
  operation: string,
  work: () => Promise<T>
): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (error instanceof DynamicFieldError) {
      throw error;
    }
    LoggerUtil.error(
      `Storage failure during ${operation}`,
      errorMessage(error),
      operation
    );
    throw new StorageError(operation, error);
  }
}
