import type { FormEvent } from "react";
import type { AnalysisResult } from "@/lib/types";
import AnalysisOutput from "./AnalysisOutput";

type Props = {
  companyName: string;
  setCompanyName: (v: string) => void;

  prompt: string;
  setPrompt: (v: string) => void;
  onResetPrompt: () => void;

  configured: boolean;
  running: boolean;
  result: AnalysisResult | null;

  onRun: (e: FormEvent) => void;
};

export default function PromptCard(props: Props) {
  return (
    <section className="hs-card">
      <div className="hs-cardHead">
        <h2 className="hs-cardTitle">Prompt</h2>
        <button type="button" className="hs-btn hs-btn-ghost" onClick={props.onResetPrompt}>
          Reset to default
        </button>
      </div>

      <div className="hs-cardBody">
        <form onSubmit={props.onRun}>
          <div className="hs-field">
            <div className="hs-label">Company name</div>
            <input
              className="hs-input"
              type="text"
              value={props.companyName}
              onChange={(e) => props.setCompanyName(e.target.value)}
              placeholder="Enter company name"
            />
            <div className="hs-subtle">
              {props.configured
                ? "Configuration loaded from Settings."
                : "Go to Settings to configure your OpenAI API key."}
            </div>
          </div>

          <div className="hs-field">
            <div className="hs-label">Prompt template</div>
            <textarea
              className="hs-textarea hs-mono"
              rows={16}
              value={props.prompt}
              onChange={(e) => props.setPrompt(e.target.value)}
            />
            <div className="hs-subtle">
              Use <span className="hs-mono">{"{company_name}"}</span> where the company goes.
              Without it, the company is appended at the end. Text after{" "}
              <span className="hs-mono">//</span> is ignored.
            </div>
          </div>

          <button type="submit" className="hs-btn hs-btn-primary" disabled={props.running}>
            {props.running ? "Generating analysis..." : "Single run"}
          </button>
        </form>

        <div style={{ marginTop: 16 }}>
          <div className="hs-label">Output</div>
          {props.result ? (
            <AnalysisOutput analysis={props.result.analysis} label={props.result.company} />
          ) : (
            <div className="hs-subtle">Click &quot;Single run&quot; to generate analysis output.</div>
          )}
        </div>
      </div>
    </section>
  );
}
