import type { ChangeEvent } from "react";
import type { DataSource, LoadedJson } from "@/components/types";

type Props = {
  dataSource: DataSource;
  setDataSource: (s: DataSource) => void;

  companies: LoadedJson | null;
  loadingCompanies: boolean;
  onUpload: (e: ChangeEvent<HTMLInputElement>) => void;

  running: boolean;
  costEstimate: string | null;
  onRunBatch: () => void;
};

export default function CompanySourceCard(props: Props) {
  const list = props.companies && Array.isArray(props.companies.data) ? props.companies.data : null;

  return (
    <section className="hs-card">
      <div className="hs-cardHead">
        <h2 className="hs-cardTitle">Company data source</h2>

        <div className="hs-seg" aria-label="Data source">
          <button
            type="button"
            data-active={props.dataSource === "sample"}
            onClick={() => props.setDataSource("sample")}
          >
            Default sample
          </button>
          <button
            type="button"
            data-active={props.dataSource === "upload"}
            onClick={() => props.setDataSource("upload")}
          >
            Upload JSON
          </button>
        </div>
      </div>

      <div className="hs-cardBody">
        {props.dataSource === "upload" && (
          <div className="hs-field">
            <div className="hs-label">JSON file</div>
            <input className="hs-input" type="file" accept=".json,application/json" onChange={props.onUpload} />
            <div className="hs-subtle">
              An array of names, or of objects with a <span className="hs-mono">name</span> field.
            </div>
          </div>
        )}

        {props.loadingCompanies ? (
          <div className="hs-subtle">Loading companies...</div>
        ) : props.companies ? (
          list ? (
            <>
              <div className="hs-alert hs-alertOk">
                Loaded {list.length} companies from {props.companies.label}
              </div>
              <pre className="hs-pre" style={{ maxHeight: 220 }}>
                {JSON.stringify(list, null, 2)}
              </pre>
            </>
          ) : (
            <div className="hs-alert hs-alertError">JSON file must contain an array of companies</div>
          )
        ) : (
          <div className="hs-subtle">No companies loaded yet.</div>
        )}

        <div className="hs-subtle" style={{ margin: "12px 0" }}>
          {props.costEstimate ? (
            <>
              Estimated cost: <span className="hs-mono">{props.costEstimate}</span>
            </>
          ) : (
            <>Estimated cost: n/a.</>
          )}
        </div>

        <button
          type="button"
          className="hs-btn hs-btn-primary"
          disabled={!list || props.running}
          onClick={props.onRunBatch}
        >
          {props.running ? "Processing companies..." : "Run batch"}
        </button>
      </div>
    </section>
  );
}
