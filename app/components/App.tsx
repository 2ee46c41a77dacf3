"use client";

import { useEffect, useMemo, useState, type ChangeEvent, type FormEvent } from "react";
import { KNOWN_MODELS, MODEL_PRICING, type KnownModel } from "./constants";
import type {
  ActualSource,
  ApiError,
  BatchRunState,
  ConfigResponse,
  DataSource,
  EnvLoadResponse,
  LoadedJson,
  MainTab,
  ModelSelectionMode,
  SessionResponse,
  ValidationResponse,
} from "./types";
import type { AnalysisResult, BatchOutput, JsonValue } from "@/lib/types";
import { parseBatchEventLines } from "@/lib/batchStream";
import { timestampedFileName } from "@/lib/files";
import { isJsonValue } from "@/lib/json";
import {
  DEFAULT_ANALYSIS_PROMPT,
  DEFAULT_VALIDATION_PROMPT,
  LEGACY_VALIDATION_PROMPT,
} from "@/lib/prompt";
import { downloadJson, readJsonFile } from "./download";

import LoginCard from "./login/LoginCard";
import PromptCard from "./analysis/PromptCard";
import CompanySourceCard from "./analysis/CompanySourceCard";
import StatusCard from "./run/StatusCard";
import LastRunCard from "./run/LastRunCard";
import AnalyticsCard from "./analytics/AnalyticsCard";
import ValidationInputsCard from "./validation/ValidationInputsCard";
import ValidationPromptCard from "./validation/ValidationPromptCard";
import ValidationResultsCard from "./validation/ValidationResultsCard";
import SettingsCard from "./settings/SettingsCard";

/**
 * JSON fetch that throws the route's `error` message on a non-2xx status.
 */
async function requestJson<T>(url: string, init?: RequestInit): Promise<T> {
  const res = await fetch(url, init);
  const data: T & ApiError = await res.json();
  if (!res.ok) throw new Error(data.error || `Request failed (${res.status})`);
  return data;
}

function postJson<T>(url: string, body: unknown): Promise<T> {
  return requestJson<T>(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

async function loadSample(kind: "input" | "expected"): Promise<LoadedJson> {
  const data = await requestJson<{ file: string; data: JsonValue }>(
    `/api/samples?kind=${kind}`
  );
  return { label: data.file, data: data.data };
}

async function loadUpload(e: ChangeEvent<HTMLInputElement>): Promise<LoadedJson | null> {
  const file = e.target.files?.[0];
  if (!file) return null;

  let parsed: unknown;
  try {
    parsed = await readJsonFile(file);
  } catch {
    throw new Error(`${file.name} is not valid JSON`);
  }
  if (!isJsonValue(parsed)) throw new Error(`${file.name} is not valid JSON`);
  return { label: file.name, data: parsed };
}

const TOKENS_PER_COMPANY_ESTIMATE = 600;
const INPUT_FRACTION = 0.5;

export default function App() {
  const [theme, setTheme] = useState<"light" | "dark">("light");
  const [tab, setTab] = useState<MainTab>("analysis");
  const [error, setError] = useState<string | null>(null);

  // Login
  const [username, setUsername] = useState<string | null>(null);
  const [usernameInput, setUsernameInput] = useState("");
  const [loggingIn, setLoggingIn] = useState(false);
  const [loginError, setLoginError] = useState<string | null>(null);
  const [checkingSession, setCheckingSession] = useState(true);

  // Config
  const [config, setConfig] = useState<ConfigResponse | null>(null);
  const [loadingConfig, setLoadingConfig] = useState(false);
  const [savingConfig, setSavingConfig] = useState(false);
  const [apiKeyInput, setApiKeyInput] = useState("");
  const [modelSelectionMode, setModelSelectionMode] = useState<ModelSelectionMode>("known");
  const [selectedKnownModel, setSelectedKnownModel] = useState<string>(KNOWN_MODELS[0]?.id ?? "");
  const [customModelId, setCustomModelId] = useState("");
  const [maxTokens, setMaxTokens] = useState(1000);
  const [temperature, setTemperature] = useState(0.7);
  const [envContent, setEnvContent] = useState("");
  const [envLoaded, setEnvLoaded] = useState<EnvLoadResponse | null>(null);

  // Single run
  const [companyName, setCompanyName] = useState("");
  const [prompt, setPrompt] = useState(DEFAULT_ANALYSIS_PROMPT);
  const [singleRunning, setSingleRunning] = useState(false);
  const [lastResult, setLastResult] = useState<AnalysisResult | null>(null);

  // Batch
  const [dataSource, setDataSource] = useState<DataSource>("sample");
  const [companies, setCompanies] = useState<LoadedJson | null>(null);
  const [loadingCompanies, setLoadingCompanies] = useState(false);
  const [batch, setBatch] = useState<BatchRunState>({ running: false, progress: null });
  const [batchOutput, setBatchOutput] = useState<BatchOutput | null>(null);

  // Validation
  const [inputSource, setInputSource] = useState<DataSource>("sample");
  const [inputJson, setInputJson] = useState<LoadedJson | null>(null);
  const [expectedSource, setExpectedSource] = useState<DataSource>("sample");
  const [expectedJson, setExpectedJson] = useState<LoadedJson | null>(null);
  const [actualSource, setActualSource] = useState<ActualSource>("batch");
  const [actualJson, setActualJson] = useState<LoadedJson | null>(null);
  const [validationPrompt, setValidationPrompt] = useState(DEFAULT_VALIDATION_PROMPT);
  const [validating, setValidating] = useState(false);
  const [validation, setValidation] = useState<ValidationResponse | null>(null);

  // Apply theme
  useEffect(() => {
    document.documentElement.setAttribute("data-theme", theme);
  }, [theme]);

  // Restore an existing session
  useEffect(() => {
    async function restore() {
      try {
        const res = await fetch("/api/session");
        if (!res.ok) return;
        const data: SessionResponse = await res.json();
        setUsername(data.username);
        setLastResult(data.lastResult);
        setBatchOutput(data.batchOutput);
      } catch (err) {
        console.error("Failed to restore session", err);
      } finally {
        setCheckingSession(false);
      }
    }
    void restore();
  }, []);

  // Load config once logged in
  useEffect(() => {
    if (!username) return;

    async function fetchConfig() {
      try {
        setLoadingConfig(true);
        applyConfig(await requestJson<ConfigResponse>("/api/config"));
      } catch (err) {
        console.error(err);
        setError(err instanceof Error ? err.message : "Failed to load config");
      } finally {
        setLoadingConfig(false);
      }
    }
    void fetchConfig();
  }, [username]);

  // Sample companies follow the data source toggle
  useEffect(() => {
    if (!username || dataSource !== "sample") return;

    async function fetchSample() {
      try {
        setLoadingCompanies(true);
        setCompanies(await loadSample("input"));
      } catch (err) {
        setCompanies(null);
        setError(err instanceof Error ? err.message : "Failed to load sample companies");
      } finally {
        setLoadingCompanies(false);
      }
    }
    void fetchSample();
  }, [username, dataSource]);

  useEffect(() => {
    if (!username || inputSource !== "sample") return;
    loadSample("input")
      .then(setInputJson)
      .catch((err: unknown) => {
        setInputJson(null);
        setError(err instanceof Error ? err.message : "Failed to load sample input");
      });
  }, [username, inputSource]);

  useEffect(() => {
    if (!username || expectedSource !== "sample") return;
    loadSample("expected")
      .then(setExpectedJson)
      .catch((err: unknown) => {
        setExpectedJson(null);
        setError(err instanceof Error ? err.message : "Failed to load sample expected output");
      });
  }, [username, expectedSource]);

  function applyConfig(next: ConfigResponse) {
    setConfig(next);
    setMaxTokens(next.maxTokens);
    setTemperature(next.temperature);

    const found = KNOWN_MODELS.find((m: KnownModel) => m.id === next.model);
    if (found) {
      setModelSelectionMode("known");
      setSelectedKnownModel(found.id);
      setCustomModelId("");
    } else {
      setModelSelectionMode("custom");
      setCustomModelId(next.model);
    }
  }

  async function handleLogin(e: FormEvent) {
    e.preventDefault();
    try {
      setLoggingIn(true);
      setLoginError(null);
      const data = await postJson<{ username: string }>("/api/login", { username: usernameInput });
      setUsername(data.username);
    } catch (err) {
      setLoginError(err instanceof Error ? err.message : "Login failed");
    } finally {
      setLoggingIn(false);
    }
  }

  async function handleLogout() {
    try {
      await postJson<{ ok: boolean }>("/api/logout", {});
    } catch (err) {
      console.error("Logout failed", err);
    }
    setUsername(null);
    setConfig(null);
    setLastResult(null);
    setBatchOutput(null);
    setValidation(null);
  }

  async function handleSingleRun(e: FormEvent) {
    e.preventDefault();
    try {
      setSingleRunning(true);
      setError(null);
      const data = await postJson<{ result: AnalysisResult }>("/api/analyze", {
        companyName,
        template: prompt,
      });
      setLastResult(data.result);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Analysis failed");
    } finally {
      setSingleRunning(false);
    }
  }

  async function handleUploadCompanies(e: ChangeEvent<HTMLInputElement>) {
    try {
      setError(null);
      const loaded = await loadUpload(e);
      if (loaded) setCompanies(loaded);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Failed to read file");
    }
  }

  async function handleRunBatch() {
    if (!companies) return;

    try {
      setError(null);
      setBatch({ running: true, progress: null });

      const res = await fetch("/api/batch", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ companies: companies.data, template: prompt }),
      });

      if (!res.ok || !res.body) {
        const data: ApiError = await res.json();
        throw new Error(data.error || "Batch failed");
      }

      const reader = res.body.getReader();
      const decoder = new TextDecoder();
      let buffer = "";

      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;

        buffer += decoder.decode(value, { stream: true });
        const { events, rest } = parseBatchEventLines(buffer);
        buffer = rest;

        for (const event of events) {
          if (event.type === "progress") {
            setBatch({ running: true, progress: event.progress });
          } else if (event.type === "done") {
            setBatchOutput(event.output);
          } else {
            throw new Error(event.error);
          }
        }
      }
    } catch (err) {
      setError(err instanceof Error ? err.message : "Batch failed");
    } finally {
      setBatch((prev) => ({ ...prev, running: false }));
    }
  }

  function handleDownloadBatch() {
    if (!batchOutput) return;
    downloadJson(timestampedFileName("company_analysis"), batchOutput);
  }

  async function uploadInto(
    e: ChangeEvent<HTMLInputElement>,
    set: (v: LoadedJson) => void
  ) {
    try {
      setError(null);
      const loaded = await loadUpload(e);
      if (loaded) set(loaded);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Failed to read file");
    }
  }

  const actualReady = actualSource === "batch" ? batchOutput !== null : actualJson !== null;
  const validationReady = inputJson !== null && expectedJson !== null && actualReady;

  async function handleRunValidation() {
    try {
      setValidating(true);
      setError(null);
      const data = await postJson<ValidationResponse>("/api/validate", {
        inputJson: inputJson?.data,
        expectedJson: expectedJson?.data,
        ...(actualSource === "batch"
          ? { useSessionBatch: true }
          : { actualJson: actualJson?.data }),
        template: validationPrompt,
      });
      setValidation(data);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Validation failed");
    } finally {
      setValidating(false);
    }
  }

  function handleDownloadValidation() {
    if (!validation?.download) return;
    downloadJson(timestampedFileName("validation_report"), validation.download);
  }

  const effectiveModel =
    modelSelectionMode === "known" ? selectedKnownModel : customModelId.trim();

  async function handleSaveConfig(e: FormEvent) {
    e.preventDefault();
    try {
      setSavingConfig(true);
      setError(null);
      const data = await postJson<ConfigResponse>("/api/config", {
        apiKey: apiKeyInput,
        model: effectiveModel,
        maxTokens,
        temperature,
      });
      applyConfig(data);
      setApiKeyInput("");
    } catch (err) {
      setError(err instanceof Error ? err.message : "Failed to save config");
    } finally {
      setSavingConfig(false);
    }
  }

  async function handleLoadEnv() {
    try {
      setError(null);
      const data = await postJson<EnvLoadResponse>("/api/config/env", {
        content: envContent,
        action: "load",
      });
      setEnvLoaded(data);
      applyConfig(await requestJson<ConfigResponse>("/api/config"));
    } catch (err) {
      setEnvLoaded(null);
      setError(err instanceof Error ? err.message : "Failed to load .env content");
    }
  }

  async function handleSaveEnvFile() {
    try {
      setError(null);
      const data = await postJson<{ path: string }>("/api/config/env", {
        content: envContent,
        action: "save",
      });
      window.alert(`Saved .env to ${data.path}`);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Failed to save .env file");
    }
  }

  async function handleClear(scope: "all" | "apiKey") {
    try {
      setError(null);
      applyConfig(
        await requestJson<ConfigResponse>(`/api/config?scope=${scope}`, { method: "DELETE" })
      );
      if (scope === "all") setEnvLoaded(null);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Failed to clear config");
    }
  }

  async function handleExport() {
    try {
      setError(null);
      const data = await requestJson<{ settings: JsonValue }>("/api/config/export");
      downloadJson(timestampedFileName("settings"), data.settings);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Failed to export settings");
    }
  }

  const costEstimate = useMemo(() => {
    const model = config?.model ?? "";
    const pricing = MODEL_PRICING[model];
    const count = companies && Array.isArray(companies.data) ? companies.data.length : 0;
    if (!pricing || count <= 0) return null;

    const totalTokens = count * TOKENS_PER_COMPANY_ESTIMATE;
    const inputTokens = totalTokens * INPUT_FRACTION;
    const outputTokens = totalTokens * (1 - INPUT_FRACTION);

    const cost =
      (inputTokens / 1_000_000) * pricing.input +
      (outputTokens / 1_000_000) * pricing.output;

    return `$${cost.toFixed(4)} approx for ${count} companies (model: ${model})`;
  }, [config, companies]);

  if (checkingSession) {
    return (
      <main className="hs-shell">
        <div className="hs-subtle">Loading...</div>
      </main>
    );
  }

  if (!username) {
    return (
      <main className="hs-shell">
        <div className="hs-header">
          <h1 className="hs-title">Handle Scout</h1>
        </div>
        <LoginCard
          username={usernameInput}
          setUsername={setUsernameInput}
          loggingIn={loggingIn}
          error={loginError}
          onLogin={handleLogin}
        />
      </main>
    );
  }

  return (
    <main className="hs-shell">
      <div className="hs-header">
        <div>
          <h1 className="hs-title">Handle Scout</h1>
          <p className="hs-lede">
            Find official Twitter handles for companies with an LLM, then check the output
            against expected results.
          </p>
        </div>

        <div className="hs-headerActions">
          <div className="hs-seg" aria-label="Section">
            <button type="button" data-active={tab === "analysis"} onClick={() => setTab("analysis")}>
              Company analysis
            </button>
            <button
              type="button"
              data-active={tab === "validation"}
              onClick={() => setTab("validation")}
            >
              Validation
            </button>
            <button type="button" data-active={tab === "settings"} onClick={() => setTab("settings")}>
              Settings
            </button>
          </div>

          <button
            type="button"
            className="hs-btn hs-btn-ghost"
            onClick={() => setTheme((prev) => (prev === "light" ? "dark" : "light"))}
          >
            {theme === "light" ? "Dark mode" : "Light mode"}
          </button>

          <button type="button" className="hs-btn hs-btn-ghost" onClick={handleLogout}>
            Logout ({username})
          </button>
        </div>
      </div>

      {error && (
        <div className="hs-alert hs-alertError" style={{ whiteSpace: "pre-wrap" }}>
          {error}
        </div>
      )}

      {tab === "analysis" && (
        <>
          <div className="hs-grid2" style={{ marginBottom: 16 }}>
            <PromptCard
              companyName={companyName}
              setCompanyName={setCompanyName}
              prompt={prompt}
              setPrompt={setPrompt}
              onResetPrompt={() => setPrompt(DEFAULT_ANALYSIS_PROMPT)}
              configured={config?.hasApiKey ?? false}
              running={singleRunning}
              result={lastResult}
              onRun={handleSingleRun}
            />

            <div>
              <CompanySourceCard
                dataSource={dataSource}
                setDataSource={setDataSource}
                companies={companies}
                loadingCompanies={loadingCompanies}
                onUpload={handleUploadCompanies}
                running={batch.running}
                costEstimate={costEstimate}
                onRunBatch={handleRunBatch}
              />
              <div style={{ marginTop: 16 }}>
                <StatusCard batch={batch} />
              </div>
            </div>
          </div>

          <LastRunCard batchOutput={batchOutput} onDownload={handleDownloadBatch} />
          <AnalyticsCard batchOutput={batchOutput} />
        </>
      )}

      {tab === "validation" && (
        <>
          <div className="hs-grid2" style={{ marginBottom: 16 }}>
            <ValidationInputsCard
              inputSource={inputSource}
              setInputSource={setInputSource}
              inputJson={inputJson}
              onUploadInput={(e) => void uploadInto(e, setInputJson)}
              expectedSource={expectedSource}
              setExpectedSource={setExpectedSource}
              expectedJson={expectedJson}
              onUploadExpected={(e) => void uploadInto(e, setExpectedJson)}
              actualSource={actualSource}
              setActualSource={setActualSource}
              actualJson={actualJson}
              batchResultCount={batchOutput ? batchOutput.results.length : null}
              onUploadActual={(e) => void uploadInto(e, setActualJson)}
            />

            <ValidationPromptCard
              prompt={validationPrompt}
              setPrompt={setValidationPrompt}
              onUseTemplate={(variant) =>
                setValidationPrompt(
                  variant === "crossCheck" ? DEFAULT_VALIDATION_PROMPT : LEGACY_VALIDATION_PROMPT
                )
              }
              running={validating}
              ready={validationReady}
              onRun={handleRunValidation}
            />
          </div>

          <ValidationResultsCard validation={validation} onDownload={handleDownloadValidation} />
        </>
      )}

      {tab === "settings" && (
        <SettingsCard
          config={config}
          loadingConfig={loadingConfig}
          savingConfig={savingConfig}
          knownModels={KNOWN_MODELS}
          modelSelectionMode={modelSelectionMode}
          setModelSelectionMode={setModelSelectionMode}
          selectedKnownModel={selectedKnownModel}
          setSelectedKnownModel={setSelectedKnownModel}
          customModelId={customModelId}
          setCustomModelId={setCustomModelId}
          apiKeyInput={apiKeyInput}
          setApiKeyInput={setApiKeyInput}
          maxTokens={maxTokens}
          setMaxTokens={setMaxTokens}
          temperature={temperature}
          setTemperature={setTemperature}
          onSave={handleSaveConfig}
          envContent={envContent}
          setEnvContent={setEnvContent}
          envLoaded={envLoaded}
          onLoadEnv={handleLoadEnv}
          onSaveEnvFile={handleSaveEnvFile}
          onClearAll={() => void handleClear("all")}
          onClearApiKey={() => void handleClear("apiKey")}
          onExport={handleExport}
        />
      )}
    </main>
  );
}
