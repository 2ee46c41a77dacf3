import type { ChangeEvent } from "react";
import type { ActualSource, DataSource, LoadedJson } from "@/components/types";

type SourceToggleProps<T extends string> = {
  label: string;
  value: T;
  options: { id: T; label: string }[];
  onChange: (v: T) => void;
};

function SourceToggle<T extends string>(props: SourceToggleProps<T>) {
  return (
    <div className="hs-seg" aria-label={props.label}>
      {props.options.map((o) => (
        <button
          key={o.id}
          type="button"
          data-active={props.value === o.id}
          onClick={() => props.onChange(o.id)}
        >
          {o.label}
        </button>
      ))}
    </div>
  );
}

function FileStatus(props: { loaded: LoadedJson | null; missing: string }) {
  if (!props.loaded) return <div className="hs-subtle">{props.missing}</div>;
  const count = Array.isArray(props.loaded.data) ? ` (${props.loaded.data.length} entries)` : "";
  return (
    <div className="hs-alert hs-alertOk">
      Loaded {props.loaded.label}
      {count}
    </div>
  );
}

type Props = {
  inputSource: DataSource;
  setInputSource: (s: DataSource) => void;
  inputJson: LoadedJson | null;
  onUploadInput: (e: ChangeEvent<HTMLInputElement>) => void;

  expectedSource: DataSource;
  setExpectedSource: (s: DataSource) => void;
  expectedJson: LoadedJson | null;
  onUploadExpected: (e: ChangeEvent<HTMLInputElement>) => void;

  actualSource: ActualSource;
  setActualSource: (s: ActualSource) => void;
  actualJson: LoadedJson | null;
  batchResultCount: number | null;
  onUploadActual: (e: ChangeEvent<HTMLInputElement>) => void;
};

const SAMPLE_OR_UPLOAD: { id: DataSource; label: string }[] = [
  { id: "sample", label: "Sample" },
  { id: "upload", label: "Upload" },
];

export default function ValidationInputsCard(props: Props) {
  return (
    <section className="hs-card">
      <div className="hs-cardHead">
        <h2 className="hs-cardTitle">JSON file inputs</h2>
      </div>

      <div className="hs-cardBody">
        <div className="hs-field">
          <div className="hs-label">1. Input companies</div>
          <SourceToggle
            label="Input source"
            value={props.inputSource}
            options={SAMPLE_OR_UPLOAD}
            onChange={props.setInputSource}
          />
          {props.inputSource === "upload" && (
            <input className="hs-input" type="file" accept=".json" onChange={props.onUploadInput} />
          )}
          <FileStatus loaded={props.inputJson} missing="Input JSON missing" />
        </div>

        <div className="hs-field">
          <div className="hs-label">2. Expected output</div>
          <SourceToggle
            label="Expected source"
            value={props.expectedSource}
            options={SAMPLE_OR_UPLOAD}
            onChange={props.setExpectedSource}
          />
          {props.expectedSource === "upload" && (
            <input className="hs-input" type="file" accept=".json" onChange={props.onUploadExpected} />
          )}
          <FileStatus loaded={props.expectedJson} missing="Expected JSON missing" />
        </div>

        <div className="hs-field">
          <div className="hs-label">3. Actual output</div>
          <SourceToggle
            label="Actual source"
            value={props.actualSource}
            options={[
              { id: "batch", label: "Current batch" },
              { id: "upload", label: "Upload" },
            ]}
            onChange={props.setActualSource}
          />
          {props.actualSource === "upload" ? (
            <>
              <input className="hs-input" type="file" accept=".json" onChange={props.onUploadActual} />
              <FileStatus loaded={props.actualJson} missing="Actual JSON missing" />
            </>
          ) : props.batchResultCount !== null ? (
            <div className="hs-alert hs-alertOk">
              Using {props.batchResultCount} results from the current batch run
            </div>
          ) : (
            <div className="hs-subtle">
              No batch results yet. Run a batch in Company Analysis first, or upload a JSON file.
            </div>
          )}
        </div>
      </div>
    </section>
  );
}
