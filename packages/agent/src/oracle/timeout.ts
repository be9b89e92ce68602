import { RoutingUnavailableError } from "@farmdesk/shared";
import type { LlmOracle, OracleRequest, OracleResponse } from "./types";

export async function invokeWithTimeout(
  oracle: LlmOracle,
  request: OracleRequest,
  timeoutMs: number
): Promise<OracleResponse> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new RoutingUnavailableError(`LLM oracle did not answer within ${timeoutMs} ms`, { context: { timeoutMs } }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([oracle.invoke({ ...request, signal: controller.signal }), timeout]);
  } catch (error) {
    throw RoutingUnavailableError.from(error);
  } finally {
    clearTimeout(timer);
  }
}
