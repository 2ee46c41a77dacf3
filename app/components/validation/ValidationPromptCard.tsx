type Props = {
  prompt: string;
  setPrompt: (v: string) => void;
  onUseTemplate: (variant: "crossCheck" | "quality") => void;
  running: boolean;
  ready: boolean;
  onRun: () => void;
};

export default function ValidationPromptCard(props: Props) {
  return (
    <section className="hs-card">
      <div className="hs-cardHead">
        <h2 className="hs-cardTitle">Validation prompt</h2>
        <div className="hs-seg" aria-label="Template">
          <button type="button" onClick={() => props.onUseTemplate("crossCheck")}>
            Handle cross-check
          </button>
          <button type="button" onClick={() => props.onUseTemplate("quality")}>
            Data quality
          </button>
        </div>
      </div>

      <div className="hs-cardBody">
        <div className="hs-field">
          <textarea
            className="hs-textarea hs-mono"
            rows={22}
            value={props.prompt}
            onChange={(e) => props.setPrompt(e.target.value)}
          />
          <div className="hs-subtle">
            <span className="hs-mono">{"{input_json}"}</span>,{" "}
            <span className="hs-mono">{"{expected_json}"}</span> and{" "}
            <span className="hs-mono">{"{actual_json}"}</span> are filled in. Write literal braces
            doubled.
          </div>
        </div>

        <button
          type="button"
          className="hs-btn hs-btn-primary"
          disabled={props.running || !props.ready}
          onClick={props.onRun}
        >
          {props.running ? "Running validation analysis..." : "Run validation"}
        </button>
      </div>
    </section>
  );
}
