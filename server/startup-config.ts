export type ViteDevConfig = {
  hmrDisabled: boolean;
  hmrPort: number | null;
  hmrHost: string | null;
  skipMiddleware: boolean;
};

export type StartupConfig = {
  port: number;
  host: string;
  sourcePort: string | undefined;
  collatzMaxSteps: number;
  vite: ViteDevConfig;
};

export const DEFAULT_COLLATZ_MAX_STEPS = 1000;

const parseBooleanFlag = (value: string | undefined, defaultValue: boolean): boolean => {
  if (!value?.trim()) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true") return true;
  if (normalized === "0" || normalized === "false") return false;
  return defaultValue;
};

const parsePositiveInt = (value: string | undefined): number | null => {
  if (!value?.trim()) return null;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) return null;
  return parsed;
};

export const resolveStartupConfig = (env: NodeJS.ProcessEnv, appEnv: string): StartupConfig => {
  const fallbackPort = appEnv === "production" ? 5000 : 5173;
  const port = parsePositiveInt(env.PORT) ?? fallbackPort;
  const host = env.HOST?.trim() ? env.HOST.trim() : "0.0.0.0";

  return {
    port,
    host,
    sourcePort: env.PORT,
    collatzMaxSteps: parsePositiveInt(env.COLLATZ_MAX_STEPS) ?? DEFAULT_COLLATZ_MAX_STEPS,
    vite: {
      hmrDisabled:
        parseBooleanFlag(env.DISABLE_VITE_HMR, false) || !parseBooleanFlag(env.VITE_HMR, true),
      hmrPort: parsePositiveInt(env.HMR_PORT) ?? parsePositiveInt(env.PORT),
      hmrHost: env.HMR_HOST?.trim() ? env.HMR_HOST.trim() : null,
      skipMiddleware: parseBooleanFlag(env.SKIP_VITE_MIDDLEWARE, false),
    },
  };
};
