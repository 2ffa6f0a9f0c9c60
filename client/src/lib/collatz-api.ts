import { CollatzErrorResponse, CollatzResponse } from "@shared/collatz-schema";
import { apiRequest } from "@/lib/queryClient";

export const COLLATZ_ENDPOINT = "/api/collatz";
export const COLLATZ_CONFIG_ENDPOINT = "/api/collatz/config";

export const COLLATZ_MESSAGES = {
  requestFailed: "The calculation failed.",
  unreadableResponse: "Could not read the server response.",
  network: "A network error occurred.",
} as const;

export class CollatzRequestError extends Error {
  status: number | null;
  constructor(message: string, status: number | null = null) {
    super(message);
    this.status = status;
    this.name = "CollatzRequestError";
  }
}

const readJson = async (response: Response): Promise<unknown> => {
  try {
    const body: unknown = await response.json();
    return body;
  } catch (error) {
    console.error("[collatz] unreadable response body:", error);
    return null;
  }
};

/**
 * Posts `{ number }` and validates the reply. Every failure surfaces as a
 * CollatzRequestError whose message is safe to show to the user.
 */
export async function requestCollatz(number: number, signal?: AbortSignal): Promise<CollatzResponse> {
  let response: Response;
  try {
    response = await apiRequest("POST", COLLATZ_ENDPOINT, { number }, signal, { allowErrorStatus: true });
  } catch (error) {
    // Aborted by a newer submit; the caller drops it.
    if (signal?.aborted) throw error;
    console.error("[collatz] request failed:", error);
    throw new CollatzRequestError(COLLATZ_MESSAGES.network);
  }

  const body = await readJson(response);

  if (!response.ok) {
    const parsedError = CollatzErrorResponse.safeParse(body);
    throw new CollatzRequestError(
      parsedError.success ? parsedError.data.error : COLLATZ_MESSAGES.requestFailed,
      response.status,
    );
  }

  const parsed = CollatzResponse.safeParse(body);
  if (!parsed.success) {
    throw new CollatzRequestError(COLLATZ_MESSAGES.unreadableResponse, response.status);
  }
  return parsed.data;
}
