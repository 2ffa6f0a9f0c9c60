import type { CollatzStepRecord } from "@shared/collatz-schema";

const OPERATION_LABELS: Record<CollatzStepRecord["operation"], string> = {
  "": "start",
  divide: "n ÷ 2",
  "multiply-add": "3n + 1",
};

export function operationLabel(operation: CollatzStepRecord["operation"]): string {
  return OPERATION_LABELS[operation];
}

export function SequenceTable({ steps }: { steps: CollatzStepRecord[] }) {
  return (
    <div className="overflow-x-auto rounded-lg border border-slate-700/60">
      <table className="w-full text-sm" data-testid="sequence-table">
        <thead className="bg-slate-900/70 text-left text-xs uppercase tracking-wide text-slate-400">
          <tr>
            <th className="px-3 py-2">Step</th>
            <th className="px-3 py-2">Value</th>
            <th className="px-3 py-2">Operation</th>
          </tr>
        </thead>
        <tbody>
          {steps.map((step) => (
            <tr
              key={step.step}
              className="border-t border-slate-800 font-mono text-slate-200"
              data-testid="sequence-row"
            >
              <td className="px-3 py-1.5" data-label="Step">{step.step}</td>
              <td className="px-3 py-1.5" data-label="Value">{step.value}</td>
              <td className="px-3 py-1.5 text-slate-400" data-label="Operation">
                {operationLabel(step.operation)}
              </td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}

export default SequenceTable;
