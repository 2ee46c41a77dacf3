import { Cell, Legend, Pie, PieChart, ResponsiveContainer, Tooltip } from "recharts";
import type { BatchOutput } from "@/lib/types";
import { summarizeBatch } from "@/lib/reports";
import { OUTCOME_COLORS } from "@/components/constants";

type Props = {
  batchOutput: BatchOutput | null;
};

export default function AnalyticsCard(props: Props) {
  if (!props.batchOutput) return null;

  const summary = summarizeBatch(props.batchOutput);
  const total = props.batchOutput.total_companies;
  const pieData = [
    { name: "Structured JSON", value: summary.structured },
    { name: "Raw text", value: summary.rawText },
    { name: "Errors", value: summary.errors },
  ];

  return (
    <section className="hs-card" style={{ marginBottom: 16 }}>
      <div className="hs-cardHead">
        <h2 className="hs-cardTitle">Batch outcomes</h2>
      </div>

      <div className="hs-cardBody">
        <div className="hs-kpiGrid">
          <div className="hs-kpi">
            <div className="hs-kpiLabel">Companies processed</div>
            <div className="hs-kpiValue">{total}</div>
          </div>
          <div className="hs-kpi">
            <div className="hs-kpiLabel">Structured rate</div>
            <div className="hs-kpiValue">
              {total > 0 ? ((summary.structured / total) * 100).toFixed(1) : "0.0"}%
            </div>
          </div>
          <div className="hs-kpi">
            <div className="hs-kpiLabel">Errors</div>
            <div className="hs-kpiValue">{summary.errors}</div>
          </div>
        </div>

        <div style={{ width: "100%", height: 240 }}>
          <ResponsiveContainer>
            <PieChart>
              <Pie data={pieData} dataKey="value" nameKey="name" outerRadius={85}>
                {pieData.map((entry, idx) => (
                  <Cell key={entry.name} fill={OUTCOME_COLORS[idx % OUTCOME_COLORS.length]} />
                ))}
              </Pie>
              <Tooltip />
              <Legend />
            </PieChart>
          </ResponsiveContainer>
        </div>
      </div>
    </section>
  );
}
