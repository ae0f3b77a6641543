import { NetworkError, StatusError } from "./errors.js";

const USER_AGENT = "modscout-cli";

export interface FetchOptions {
  /** Deadline shared by every request of one operation */
  signal?: AbortSignal;
  /** Called before each outbound request */
  log?: (message: string) => void;
}

export interface GetOptions extends FetchOptions {
  /** Reject any status other than 200. Default: true */
  only200?: boolean;
}

function networkError(url: string, err: unknown, signal?: AbortSignal): NetworkError {
  if (signal?.aborted) {
    const reason = signal.reason;
    const timedOut = reason instanceof Error && reason.name === "TimeoutError";
    return new NetworkError(
      url,
      timedOut ? "timeout" : "aborted",
      `GET ${url}: ${timedOut ? "deadline exceeded" : "request cancelled"}`,
      { cause: err },
    );
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new NetworkError(url, "connection", `GET ${url}: ${detail}`, {
    cause: err,
  });
}

/**
 * Fetch the body of a GET request as text.
 *
 * Any status other than 200 is a StatusError unless `only200` is false.
 * Transport failures, including the signal firing mid-request, are
 * NetworkErrors.
 */
export async function getText(
  url: string,
  options: GetOptions = {},
): Promise<string> {
  const { signal, log, only200 = true } = options;
  log?.(`→ GET ${url}`);

  let response: Response;
  try {
    response = await fetch(url, {
      signal,
      redirect: "follow",
      headers: {
        "User-Agent": USER_AGENT,
      },
    });
  } catch (err) {
    throw networkError(url, err, signal);
  }

  if (only200 && response.status !== 200) {
    await response.body?.cancel();
    throw new StatusError(url, response.status, response.statusText);
  }

  try {
    return await response.text();
  } catch (err) {
    throw networkError(url, err, signal);
  }
}
