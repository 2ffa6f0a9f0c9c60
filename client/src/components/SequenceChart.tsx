import { Bar, BarChart, CartesianGrid, ResponsiveContainer, Tooltip, XAxis, YAxis } from "recharts";
import type { CollatzStepRecord } from "@shared/collatz-schema";

type SequenceChartProps = {
  steps: CollatzStepRecord[];
  // Axis top; fixed up front so bars keep their scale while the reveal runs.
  peak: number;
};

export function SequenceChart({ steps, peak }: SequenceChartProps) {
  const data = steps.map((step) => ({ label: `#${step.step}`, value: step.value }));
  const domainMax = peak > 0 ? peak : 1;

  return (
    <div className="h-64 w-full" data-testid="sequence-chart">
      <ResponsiveContainer width="100%" height="100%">
        <BarChart data={data} margin={{ top: 8, right: 8, bottom: 8, left: 8 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#1e293b" />
          <XAxis dataKey="label" tick={{ fontSize: 10, fill: "#94a3b8" }} interval="preserveStartEnd" />
          <YAxis domain={[0, domainMax]} tick={{ fontSize: 10, fill: "#94a3b8" }} />
          <Tooltip
            cursor={{ fill: "rgba(148,163,184,0.08)" }}
            contentStyle={{ background: "#0f172a", border: "1px solid #334155", fontSize: 12 }}
          />
          <Bar dataKey="value" fill="#38bdf8" isAnimationActive={false} />
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
}

export default SequenceChart;
