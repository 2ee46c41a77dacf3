import type { FormEvent } from "react";
import type { ConfigResponse, EnvLoadResponse, ModelSelectionMode } from "@/components/types";

type KnownModel = { id: string; label: string };

const SOURCE_LABELS: Record<ConfigResponse["source"], string> = {
  sheet: "Hosted secrets sheet",
  user: "Your saved settings",
  envFile: "Local .env file",
  empty: "Nothing configured",
};

type Props = {
  config: ConfigResponse | null;
  loadingConfig: boolean;
  savingConfig: boolean;

  knownModels: KnownModel[];

  modelSelectionMode: ModelSelectionMode;
  setModelSelectionMode: (m: ModelSelectionMode) => void;

  selectedKnownModel: string;
  setSelectedKnownModel: (v: string) => void;

  customModelId: string;
  setCustomModelId: (v: string) => void;

  apiKeyInput: string;
  setApiKeyInput: (v: string) => void;

  maxTokens: number;
  setMaxTokens: (v: number) => void;

  temperature: number;
  setTemperature: (v: number) => void;

  onSave: (e: FormEvent) => void;

  envContent: string;
  setEnvContent: (v: string) => void;
  envLoaded: EnvLoadResponse | null;
  onLoadEnv: () => void;
  onSaveEnvFile: () => void;

  onClearAll: () => void;
  onClearApiKey: () => void;
  onExport: () => void;
};

const ENV_PLACEHOLDER = `OPENAI_API_KEY=your_key_here
OPENAI_MODEL=gpt-3.5-turbo
MAX_TOKENS=1000
TEMPERATURE=0.7
# Add more variables as needed`;

export default function SettingsCard(props: Props) {
  return (
    <>
      <div className="hs-grid2" style={{ marginBottom: 16 }}>
        <section className="hs-card">
          <div className="hs-cardHead">
            <h2 className="hs-cardTitle">Settings</h2>
          </div>

          <div className="hs-cardBody">
            {props.loadingConfig ? (
              <div className="hs-subtle">Loading config...</div>
            ) : (
              <form onSubmit={props.onSave}>
                <div className="hs-field">
                  <div className="hs-label">OpenAI API key</div>
                  <input
                    className="hs-input"
                    type="password"
                    value={props.apiKeyInput}
                    onChange={(e) => props.setApiKeyInput(e.target.value)}
                    placeholder="Enter your OpenAI API key"
                    autoComplete="off"
                  />
                  <div className="hs-subtle">
                    {props.config?.hasApiKey
                      ? "API key is configured. Leave blank to keep it."
                      : "API key not configured."}
                  </div>
                </div>

                <div className="hs-field">
                  <div className="hs-label">Model</div>

                  <div className="hs-seg" aria-label="Model picker">
                    <button
                      type="button"
                      data-active={props.modelSelectionMode === "known"}
                      onClick={() => props.setModelSelectionMode("known")}
                    >
                      Known
                    </button>
                    <button
                      type="button"
                      data-active={props.modelSelectionMode === "custom"}
                      onClick={() => props.setModelSelectionMode("custom")}
                    >
                      Custom
                    </button>
                  </div>

                  {props.modelSelectionMode === "known" ? (
                    <select
                      className="hs-select"
                      value={props.selectedKnownModel}
                      onChange={(e) => props.setSelectedKnownModel(e.target.value)}
                    >
                      {props.knownModels.map((m) => (
                        <option key={m.id} value={m.id}>
                          {m.label}
                        </option>
                      ))}
                    </select>
                  ) : (
                    <input
                      className="hs-input"
                      type="text"
                      value={props.customModelId}
                      onChange={(e) => props.setCustomModelId(e.target.value)}
                      placeholder="e.g. gpt-4o-2024-08-06"
                    />
                  )}
                </div>

                <div className="hs-row2">
                  <div className="hs-field">
                    <div className="hs-label">Max tokens</div>
                    <input
                      className="hs-input"
                      type="number"
                      min={100}
                      max={4000}
                      value={props.maxTokens}
                      onChange={(e) =>
                        props.setMaxTokens(Math.max(100, Math.min(4000, Number(e.target.value) || 100)))
                      }
                    />
                    <div className="hs-subtle">Maximum tokens for each response.</div>
                  </div>

                  <div className="hs-field">
                    <div className="hs-label">Temperature ({props.temperature.toFixed(1)})</div>
                    <input
                      type="range"
                      min={0}
                      max={2}
                      step={0.1}
                      value={props.temperature}
                      onChange={(e) => props.setTemperature(Number(e.target.value))}
                    />
                    <div className="hs-subtle">Controls randomness in responses.</div>
                  </div>
                </div>

                <button type="submit" className="hs-btn hs-btn-primary" disabled={props.savingConfig}>
                  {props.savingConfig ? "Saving..." : "Save settings"}
                </button>
              </form>
            )}
          </div>
        </section>

        <section className="hs-card">
          <div className="hs-cardHead">
            <h2 className="hs-cardTitle">.env file configuration</h2>
          </div>

          <div className="hs-cardBody">
            <div className="hs-field">
              <textarea
                className="hs-textarea hs-mono"
                rows={10}
                value={props.envContent}
                onChange={(e) => props.setEnvContent(e.target.value)}
                placeholder={ENV_PLACEHOLDER}
              />
              <div className="hs-subtle">One KEY=VALUE per line. Lines starting with # are ignored.</div>
            </div>

            <div style={{ display: "flex", gap: 8, flexWrap: "wrap" }}>
              <button type="button" className="hs-btn hs-btn-primary" onClick={props.onLoadEnv}>
                Load from .env content
              </button>
              <button type="button" className="hs-btn hs-btn-ghost" onClick={props.onSaveEnvFile}>
                Save .env to file
              </button>
            </div>

            {props.envLoaded && (
              <div style={{ marginTop: 12 }}>
                <div className="hs-alert hs-alertOk">
                  Loaded {props.envLoaded.loaded} environment variables
                </div>
                <ul className="hs-list hs-mono">
                  {props.envLoaded.variables.map((v) => (
                    <li key={v.key}>
                      {v.key}: {v.value}
                    </li>
                  ))}
                </ul>
              </div>
            )}
          </div>
        </section>
      </div>

      <section className="hs-card" style={{ marginBottom: 16 }}>
        <div className="hs-cardHead">
          <h2 className="hs-cardTitle">Current configuration</h2>
          {props.config && <div className="hs-subtle">{SOURCE_LABELS[props.config.source]}</div>}
        </div>

        <div className="hs-cardBody">
          {props.config ? (
            <>
              <div className="hs-kpiGrid">
                <div className="hs-kpi">
                  <div className="hs-kpiLabel">API key</div>
                  <div className="hs-kpiValue hs-mono">
                    {props.config.maskedApiKey ?? "Not set"}
                  </div>
                </div>
                <div className="hs-kpi">
                  <div className="hs-kpiLabel">Model</div>
                  <div className="hs-kpiValue">{props.config.model}</div>
                </div>
                <div className="hs-kpi">
                  <div className="hs-kpiLabel">Max tokens</div>
                  <div className="hs-kpiValue">{props.config.maxTokens}</div>
                </div>
                <div className="hs-kpi">
                  <div className="hs-kpiLabel">Temperature</div>
                  <div className="hs-kpiValue">{props.config.temperature}</div>
                </div>
                <div className="hs-kpi">
                  <div className="hs-kpiLabel">Variables loaded</div>
                  <div className="hs-kpiValue">{props.config.totalVariables}</div>
                </div>
              </div>

              <div className="hs-subtle" style={{ marginBottom: 12 }}>
                Last saved: {props.config.lastSaved ?? "Never"}
              </div>

              <div style={{ display: "flex", gap: 8, flexWrap: "wrap" }}>
                <button type="button" className="hs-btn hs-btn-ghost" onClick={props.onClearAll}>
                  Clear configuration
                </button>
                <button type="button" className="hs-btn hs-btn-ghost" onClick={props.onClearApiKey}>
                  Clear API key only
                </button>
                <button type="button" className="hs-btn hs-btn-ghost" onClick={props.onExport}>
                  Export settings
                </button>
              </div>
            </>
          ) : (
            <div className="hs-subtle">No configuration loaded.</div>
          )}
        </div>
      </section>
    </>
  );
}
