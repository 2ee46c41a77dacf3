import type { BatchOutput } from "@/lib/types";
import { isErrorAnalysis } from "@/lib/reports";
import AnalysisOutput from "@/components/analysis/AnalysisOutput";

type Props = {
  batchOutput: BatchOutput | null;
  onDownload: () => void;
};

export default function LastRunCard(props: Props) {
  const output = props.batchOutput;

  return (
    <section className="hs-card" style={{ marginBottom: 16 }}>
      <div className="hs-cardHead">
        <h2 className="hs-cardTitle">Generated output</h2>
        {output && (
          <button type="button" className="hs-btn hs-btn-ghost" onClick={props.onDownload}>
            Download analysis results
          </button>
        )}
      </div>

      <div className="hs-cardBody">
        {output ? (
          <>
            <div style={{ fontSize: 13, marginBottom: 10 }}>
              Processed <strong>{output.total_companies}</strong> companies at{" "}
              <span className="hs-mono">{output.generated_at}</span>.
            </div>

            <details>
              <summary className="hs-subtle">View complete results</summary>
              <ul className="hs-list">
                {output.results.map((r, idx) => (
                  <li key={`${idx}-${r.company}`}>
                    <div style={{ marginBottom: 6 }}>
                      <strong>{r.company}</strong>
                      {isErrorAnalysis(r.analysis) && <span className="hs-badge hs-badgeError">error</span>}
                    </div>
                    <AnalysisOutput analysis={r.analysis} label={r.company} />
                  </li>
                ))}
              </ul>
            </details>
          </>
        ) : (
          <div className="hs-subtle">No batch results yet.</div>
        )}
      </div>
    </section>
  );
}
