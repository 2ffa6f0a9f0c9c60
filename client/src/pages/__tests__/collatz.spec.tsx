// @vitest-environment jsdom
import React from "react";
import { QueryClient, QueryClientProvider } from "@tanstack/react-query";
import { act, cleanup, fireEvent, render, screen, waitFor } from "@testing-library/react";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { computeCollatz, describeCollatzSteps } from "@shared/collatz";
import { CollatzRequestError, requestCollatz } from "@/lib/collatz-api";
import CollatzPage from "../collatz";

vi.mock("@/lib/collatz-api", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/lib/collatz-api")>();
  return { ...actual, requestCollatz: vi.fn() };
});

// recharts measures its container through ResizeObserver, which jsdom lacks.
vi.mock("@/components/SequenceChart", () => ({
  SequenceChart: ({ steps }: { steps: unknown[] }) => (
    <div data-testid="sequence-chart">{steps.length}</div>
  ),
}));

const mockRequestCollatz = vi.mocked(requestCollatz);

const renderPage = () => {
  const client = new QueryClient({
    defaultOptions: {
      queries: { retry: false, queryFn: async () => ({ maxSteps: 1000 }) },
      mutations: { retry: false },
    },
  });
  return render(
    <QueryClientProvider client={client}>
      <CollatzPage />
    </QueryClientProvider>,
  );
};

const submitNumber = (value: string) => {
  fireEvent.change(screen.getByLabelText("Starting number"), { target: { value } });
  fireEvent.click(screen.getByRole("button", { name: "Compute" }));
};

describe("CollatzPage", () => {
  beforeEach(() => {
    mockRequestCollatz.mockReset();
  });

  afterEach(() => {
    cleanup();
    vi.useRealTimers();
  });

  it("shows the configured step limit", async () => {
    renderPage();
    expect(await screen.findByText(/Sequences stop after 1000 steps\./)).toBeInTheDocument();
  });

  it("renders the sequence for 1 without pausing", async () => {
    const { values, truncated } = computeCollatz(1, 1000);
    mockRequestCollatz.mockResolvedValueOnce({
      steps: describeCollatzSteps(values),
      truncated,
      maxSteps: 1000,
    });
    renderPage();

    submitNumber("1");

    expect(await screen.findByTestId("success-message")).toHaveTextContent(
      "Computed 0 steps (1 value including the start).",
    );
    expect(mockRequestCollatz).toHaveBeenCalledWith(1, expect.any(AbortSignal));
    expect(screen.getAllByTestId("sequence-row")).toHaveLength(1);
    expect(screen.getByTestId("sequence-chart")).toHaveTextContent("1");
    expect(screen.queryByTestId("warning-message")).not.toBeInTheDocument();
  });

  it.each([
    ["", "Please enter a value."],
    ["2.5", "Enter an integer of 1 or greater."],
  ])("rejects %j before calling the server", async (value, message) => {
    renderPage();

    submitNumber(value);

    expect(await screen.findByRole("alert")).toHaveTextContent(message);
    expect(mockRequestCollatz).not.toHaveBeenCalled();
    expect(screen.queryByTestId("sequence-table")).not.toBeInTheDocument();
  });

  it("shows the server's error message", async () => {
    mockRequestCollatz.mockRejectedValueOnce(new CollatzRequestError("The calculation failed.", 500));
    renderPage();

    submitNumber("7");

    expect(await screen.findByRole("alert")).toHaveTextContent("The calculation failed.");
    await waitFor(() => expect(screen.getByRole("button", { name: "Compute" })).toBeEnabled());
    expect(screen.queryByTestId("sequence-table")).not.toBeInTheDocument();
  });

  it("keeps the reveal progress visible next to an input error", async () => {
    vi.useFakeTimers();
    const { values, truncated } = computeCollatz(6, 1000);
    mockRequestCollatz.mockResolvedValueOnce({
      steps: describeCollatzSteps(values),
      truncated,
      maxSteps: 1000,
    });
    renderPage();

    submitNumber("6");
    await act(async () => {
      await vi.advanceTimersByTimeAsync(0);
    });
    expect(screen.getByTestId("success-message")).toHaveTextContent("Computing… (0/8)");

    submitNumber("");
    expect(screen.getByRole("alert")).toHaveTextContent("Please enter a value.");
    expect(screen.getByTestId("success-message")).toHaveTextContent("Computing… (0/8)");

    await act(async () => {
      await vi.advanceTimersByTimeAsync(1000);
    });
    expect(screen.getAllByTestId("sequence-row")).toHaveLength(2);
    expect(screen.getByTestId("success-message")).toHaveTextContent("Computing… (1/8)");
    expect(screen.getByRole("alert")).toHaveTextContent("Please enter a value.");
    expect(mockRequestCollatz).toHaveBeenCalledTimes(1);
  });
});
