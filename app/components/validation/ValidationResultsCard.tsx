import type { ValidationResponse } from "@/components/types";
import { isCrossCheckReport, isQualityReport } from "@/lib/reports";
import AnalysisOutput from "@/components/analysis/AnalysisOutput";

type Props = {
  validation: ValidationResponse | null;
  onDownload: () => void;
};

function IssueList(props: { title: string; items: string[] }) {
  if (!props.items.length) return null;
  return (
    <div style={{ marginBottom: 10 }}>
      <div className="hs-label">{props.title}</div>
      <ul className="hs-list">
        {props.items.map((item, idx) => (
          <li key={idx}>{item}</li>
        ))}
      </ul>
    </div>
  );
}

export default function ValidationResultsCard(props: Props) {
  const v = props.validation;

  return (
    <section className="hs-card">
      <div className="hs-cardHead">
        <h2 className="hs-cardTitle">Validation results</h2>
        {v?.download && (
          <button type="button" className="hs-btn hs-btn-ghost" onClick={props.onDownload}>
            Download validation report
          </button>
        )}
      </div>

      <div className="hs-cardBody">
        {!v ? (
          <div className="hs-subtle">Run validation analysis to see results here.</div>
        ) : (
          <>
            {isCrossCheckReport(v.report) ? (
              <>
                <div className="hs-kpiGrid">
                  <div className="hs-kpi">
                    <div className="hs-kpiLabel">Company name match</div>
                    <div style={{ fontSize: 13 }}>{v.report.company_name_match}</div>
                  </div>
                  <div className="hs-kpi">
                    <div className="hs-kpiLabel">Handle validity</div>
                    <div style={{ fontSize: 13 }}>{v.report.twitter_handle_validity}</div>
                  </div>
                  <div className="hs-kpi">
                    <div className="hs-kpiLabel">Handle accuracy</div>
                    <div style={{ fontSize: 13 }}>{v.report.twitter_handle_accuracy}</div>
                  </div>
                </div>
                <IssueList title="Inconsistencies" items={v.report.inconsistencies} />
                <div style={{ fontSize: 13, marginBottom: 10 }}>
                  Overall: <strong>{v.report.overall_assessment}</strong>
                </div>
                <IssueList title="Recommendations" items={v.report.recommendations} />
              </>
            ) : isQualityReport(v.report) ? (
              <>
                <div className="hs-kpiGrid">
                  <div className="hs-kpi">
                    <div className="hs-kpiLabel">Completeness</div>
                    <div style={{ fontSize: 13 }}>{v.report.data_completeness}</div>
                  </div>
                  <div className="hs-kpi">
                    <div className="hs-kpiLabel">Format compliance</div>
                    <div style={{ fontSize: 13 }}>{v.report.format_compliance}</div>
                  </div>
                  <div className="hs-kpi">
                    <div className="hs-kpiLabel">Data quality</div>
                    <div style={{ fontSize: 13 }}>{v.report.data_quality}</div>
                  </div>
                </div>
                <IssueList title="Missing elements" items={v.report.missing_elements} />
                <div style={{ fontSize: 13, marginBottom: 10 }}>
                  Overall: <strong>{v.report.overall_assessment}</strong>
                </div>
                <IssueList title="Recommendations" items={v.report.recommendations} />
              </>
            ) : null}

            <AnalysisOutput analysis={v.report} label="Validation analysis" />

            <details style={{ marginTop: 12 }}>
              <summary className="hs-subtle">File summaries</summary>
              <pre className="hs-pre">{JSON.stringify(v.summaries, null, 2)}</pre>
            </details>
          </>
        )}
      </div>
    </section>
  );
}
