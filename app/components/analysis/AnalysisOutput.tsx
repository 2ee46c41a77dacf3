import type { JsonValue } from "@/lib/types";
import { normalizeResponse } from "@/lib/normalize";

type Props = {
  analysis: JsonValue;
  label?: string;
};

/**
 * Pretty JSON when the value is (or parses as) JSON, plain text otherwise.
 */
export default function AnalysisOutput(props: Props) {
  const value =
    typeof props.analysis === "string" ? normalizeResponse(props.analysis) : props.analysis;

  if (typeof value === "string") {
    return (
      <div>
        {props.label && <div className="hs-label">{props.label}</div>}
        <textarea className="hs-textarea" value={value} rows={6} readOnly disabled />
      </div>
    );
  }

  return (
    <pre className="hs-pre" aria-label={props.label}>
      {JSON.stringify(value, null, 2)}
    </pre>
  );
}
