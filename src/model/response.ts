// pattern: Imperative Shell

/**
 * One logical model call: request, shape validation, bounded retry.
 */

import type { Logger } from "../logging/logger.ts";
import { callWithRetry } from "./retry.ts";
import type { RetryOptions } from "./retry.ts";
import { InvalidResponseError, LengthFinishError } from "./types.ts";
import type { Choice, ModelProvider, ModelRequest, ModelResponse } from "./types.ts";

const VALID_FINISH_REASONS: ReadonlySet<string> = new Set(["stop", "function_call", "tool_calls"]);

export type ValidatedResponse = {
  response: ModelResponse;
  choice: Choice;
};

/**
 * Classify a response. Shape faults raise InvalidResponseError (retryable);
 * finish_reason "length" raises LengthFinishError (fatal).
 */
export function validateModelResponse(response: ModelResponse): ValidatedResponse {
  if (response.choices.length === 0) {
    throw new InvalidResponseError("model returned no choices");
  }
  const choice = response.choices[0];
  if (!choice) {
    throw new InvalidResponseError("model returned a null first choice");
  }
  const reason = choice.finish_reason;
  if (reason === "length") {
    throw new LengthFinishError();
  }
  if (reason === null || !VALID_FINISH_REASONS.has(reason)) {
    throw new InvalidResponseError(`model returned a bad finish reason: ${String(reason)}`);
  }
  return { response, choice };
}

export type GetAiReplyOptions = {
  provider: ModelProvider;
  request: ModelRequest;
  retry?: Partial<RetryOptions>;
  logger?: Logger;
};

export async function getAiReply(options: GetAiReplyOptions): Promise<ValidatedResponse> {
  const { provider, request, retry, logger } = options;

  return callWithRetry(
    async () => validateModelResponse(await provider.complete(request)),
    (error) => error instanceof InvalidResponseError,
    {
      ...retry,
      onError: (error, attempt) => {
        logger?.warn(
          { attempt, model: request.model, err: error },
          "model call failed",
        );
        retry?.onError?.(error, attempt);
      },
    },
  );
}
