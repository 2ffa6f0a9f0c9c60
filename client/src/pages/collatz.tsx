import { useState, type FormEvent } from "react";
import { AlertTriangle, Calculator, CheckCircle2, XCircle } from "lucide-react";
import { SequenceChart } from "@/components/SequenceChart";
import { SequenceTable } from "@/components/SequenceTable";
import { useCollatzConfig, useCollatzReveal } from "@/hooks/use-collatz-reveal";
import { cn } from "@/lib/utils";

export default function CollatzPage() {
  const [input, setInput] = useState("");
  const { state, status, inputError, isLoading, submit } = useCollatzReveal();
  const { data: config } = useCollatzConfig();

  const error = inputError ?? state.error;
  const showResults = state.phase === "revealing" || state.phase === "done";

  const onSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    void submit(input);
  };

  return (
    <main className="mx-auto flex min-h-screen max-w-4xl flex-col gap-6 px-4 py-10 text-slate-100">
      <header className="space-y-1">
        <h1 className="flex items-center gap-2 text-2xl font-semibold">
          <Calculator className="h-6 w-6 text-sky-400" aria-hidden />
          Collatz sequence
        </h1>
        <p className="text-sm text-slate-400">
          Halve even numbers, triple odd numbers and add one, until the value reaches 1.
          {config ? ` Sequences stop after ${config.maxSteps} steps.` : null}
        </p>
      </header>

      <form className="flex flex-wrap items-end gap-3" onSubmit={onSubmit} noValidate>
        <label className="flex flex-col gap-1 text-sm">
          <span className="text-slate-300">Starting number</span>
          <input
            id="number"
            name="number"
            type="number"
            min={1}
            step={1}
            inputMode="numeric"
            value={input}
            onChange={(event) => setInput(event.target.value)}
            className="w-48 rounded-md border border-slate-700 bg-slate-900 px-3 py-2 font-mono focus:border-sky-500 focus:outline-none"
          />
        </label>
        <button
          type="submit"
          disabled={isLoading}
          className={cn(
            "rounded-md px-4 py-2 text-sm font-medium transition",
            isLoading ? "cursor-wait bg-slate-700 text-slate-300" : "bg-sky-600 text-white hover:bg-sky-500",
          )}
        >
          {isLoading ? "Computing…" : "Compute"}
        </button>
      </form>

      <div className="space-y-2" aria-live="polite">
        {error ? (
          <p role="alert" className="flex items-center gap-2 text-sm text-rose-400" data-testid="error-message">
            <XCircle className="h-4 w-4" aria-hidden />
            {error}
          </p>
        ) : null}
        {status.progress ? (
          <p className="flex items-center gap-2 text-sm text-emerald-400" data-testid="success-message">
            <CheckCircle2 className="h-4 w-4" aria-hidden />
            {status.progress}
          </p>
        ) : null}
        {status.warning ? (
          <p className="flex items-center gap-2 text-sm text-amber-400" data-testid="warning-message">
            <AlertTriangle className="h-4 w-4" aria-hidden />
            {status.warning}
          </p>
        ) : null}
      </div>

      {showResults ? (
        <>
          <section className="space-y-2">
            <h2 className="text-sm font-semibold uppercase tracking-wide text-slate-400">Chart</h2>
            <SequenceChart steps={state.steps} peak={state.peak} />
          </section>
          <section className="space-y-2">
            <h2 className="text-sm font-semibold uppercase tracking-wide text-slate-400">Steps</h2>
            <SequenceTable steps={state.steps} />
          </section>
        </>
      ) : null}
    </main>
  );
}
