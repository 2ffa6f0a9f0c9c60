import { QueryClient, type QueryFunction } from "@tanstack/react-query";

export interface ApiRequestOptions {
  /** Resolve non-2xx responses instead of throwing, for callers that read the error body. */
  allowErrorStatus?: boolean;
}

async function throwIfResNotOk(res: Response) {
  if (!res.ok) {
    const text = (await res.text()) || res.statusText;
    throw new Error(`${res.status}: ${text}`);
  }
}

export async function apiRequest(
  method: string,
  url: string,
  data?: unknown,
  signal?: AbortSignal,
  options: ApiRequestOptions = {},
): Promise<Response> {
  const res = await fetch(url, {
    method,
    headers: data !== undefined ? { "Content-Type": "application/json" } : {},
    body: data !== undefined ? JSON.stringify(data) : undefined,
    credentials: "include",
    signal,
  });

  if (!options.allowErrorStatus) {
    await throwIfResNotOk(res);
  }
  return res;
}

export function getQueryFn<T>(): QueryFunction<T> {
  return async ({ queryKey, signal }) => {
    const url = queryKey.find(
      (part): part is string => typeof part === "string" && part.length > 0,
    );
    if (!url) {
      throw new Error("queryKey must include a request URL string");
    }

    const res = await fetch(url, { credentials: "include", signal });
    await throwIfResNotOk(res);
    const body: T = await res.json();
    return body;
  };
}

export const queryClient = new QueryClient({
  defaultOptions: {
    queries: {
      queryFn: getQueryFn(),
      refetchInterval: false,
      refetchOnWindowFocus: false,
      staleTime: Infinity,
      retry: false,
    },
    mutations: {
      retry: false,
    },
  },
});
