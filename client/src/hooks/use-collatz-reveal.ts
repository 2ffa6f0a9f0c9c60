import { useCallback, useEffect, useRef, useState } from "react";
import { useMutation, useQuery } from "@tanstack/react-query";
import type { CollatzConfig, CollatzResponse, CollatzStepRecord } from "@shared/collatz-schema";
import { COLLATZ_CONFIG_ENDPOINT, CollatzRequestError, requestCollatz } from "@/lib/collatz-api";
import { DisplayGeneration, REVEAL_DELAY_MS, revealInOrder, type Sleep } from "@/lib/sequence-reveal";

export type RevealPhase = "idle" | "loading" | "revealing" | "done" | "error";

export interface CollatzRevealState {
  phase: RevealPhase;
  steps: CollatzStepRecord[];
  totalValues: number;
  peak: number;
  truncated: boolean;
  maxSteps: number | null;
  error: string | null;
}

export interface RevealStatus {
  progress: string | null;
  warning: string | null;
}

export const INPUT_MESSAGES = {
  empty: "Please enter a value.",
  invalid: "Enter an integer of 1 or greater.",
} as const;

export const initialRevealState: CollatzRevealState = {
  phase: "idle",
  steps: [],
  totalValues: 0,
  peak: 0,
  truncated: false,
  maxSteps: null,
  error: null,
};

export type InputCheck = { ok: true; number: number } | { ok: false; message: string };

export function checkCollatzInput(raw: string): InputCheck {
  const value = raw.trim();
  if (!value) {
    return { ok: false, message: INPUT_MESSAGES.empty };
  }
  const number = Number(value);
  if (!Number.isInteger(number) || number < 1) {
    return { ok: false, message: INPUT_MESSAGES.invalid };
  }
  return { ok: true, number };
}

const countLabel = (count: number, noun: string): string =>
  `${count} ${noun}${count === 1 ? "" : "s"}`;

export function describeRevealStatus(state: CollatzRevealState): RevealStatus {
  const computedSteps = Math.max(state.totalValues - 1, 0);
  let progress: string | null = null;

  if (state.phase === "revealing") {
    const last = state.steps[state.steps.length - 1];
    if (!last) {
      progress = "Starting the calculation…";
    } else if (computedSteps > 0) {
      progress = `Computing… (${Math.min(last.step, computedSteps)}/${computedSteps})`;
    } else {
      progress = "Computing…";
    }
  } else if (state.phase === "done") {
    progress =
      `Computed ${countLabel(computedSteps, "step")} ` +
      `(${countLabel(state.totalValues, "value")} including the start).`;
  }

  const warning =
    state.phase === "done" && state.truncated
      ? `Stopped early after reaching the ${state.maxSteps ?? computedSteps}-step limit.`
      : null;

  return { progress, warning };
}

type CollatzRequestVariables = {
  number: number;
  signal: AbortSignal;
};

export type UseCollatzRevealOptions = {
  delayMs?: number;
  sleep?: Sleep;
};

/**
 * Submits a number and reveals the returned steps one per tick. A newer
 * submit (or unmount) bumps the display generation and aborts the pending
 * request, which stops the older reveal without touching state.
 */
export function useCollatzReveal({ delayMs = REVEAL_DELAY_MS, sleep }: UseCollatzRevealOptions = {}) {
  const [state, setState] = useState<CollatzRevealState>(initialRevealState);
  const [inputError, setInputError] = useState<string | null>(null);
  const generationRef = useRef(new DisplayGeneration());
  const requestRef = useRef<AbortController | null>(null);
  const mutation = useMutation<CollatzResponse, Error, CollatzRequestVariables>({
    mutationFn: ({ number, signal }) => requestCollatz(number, signal),
  });
  const { mutateAsync } = mutation;

  useEffect(() => {
    const generation = generationRef.current;
    return () => {
      generation.next();
      requestRef.current?.abort();
    };
  }, []);

  const submit = useCallback(
    async (raw: string): Promise<void> => {
      setInputError(null);
      const checked = checkCollatzInput(raw);
      if (!checked.ok) {
        setInputError(checked.message);
        return;
      }

      const generation = generationRef.current;
      const ticket = generation.next();
      const isCurrent = () => generation.isCurrent(ticket);
      requestRef.current?.abort();
      const controller = new AbortController();
      requestRef.current = controller;
      setState({ ...initialRevealState, phase: "loading" });

      let response: CollatzResponse;
      try {
        response = await mutateAsync({ number: checked.number, signal: controller.signal });
      } catch (error) {
        if (!isCurrent()) return;
        const message =
          error instanceof CollatzRequestError ? error.message : "The calculation failed.";
        setState({ ...initialRevealState, phase: "error", error: message });
        return;
      }
      if (!isCurrent()) return;

      setState({
        ...initialRevealState,
        phase: "revealing",
        totalValues: response.steps.length,
        peak: response.steps.reduce((max, step) => Math.max(max, step.value), 0),
        truncated: response.truncated,
        maxSteps: response.maxSteps,
      });

      const finished = await revealInOrder(response.steps, {
        delayMs,
        sleep,
        isCurrent,
        onItem: (step) => {
          setState((prev) => ({ ...prev, steps: [...prev.steps, step] }));
        },
      });
      if (finished) {
        setState((prev) => ({ ...prev, phase: "done" }));
      }
    },
    [delayMs, sleep, mutateAsync],
  );

  return {
    state,
    status: describeRevealStatus(state),
    inputError,
    isLoading: state.phase === "loading",
    submit,
  };
}

export function useCollatzConfig() {
  return useQuery<CollatzConfig>({ queryKey: [COLLATZ_CONFIG_ENDPOINT] });
}
