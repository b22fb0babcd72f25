import React, { useCallback, useEffect, useMemo, useState } from "react";
import { makeApi, type Api } from "./api";
import type { HistoryEntry } from "./types/api";
import { ConverterPanel } from "./components/ConverterPanel";
import { CalculatorPanel } from "./components/CalculatorPanel";
import { HistoryPanel } from "./components/HistoryPanel";

export default function App({ api: injected }: { api?: Api }) {
  const api = useMemo(() => injected ?? makeApi(), [injected]);

  const [history, setHistory] = useState<HistoryEntry[]>([]);
  const [log, setLog] = useState<string[]>([]);
  const pushLog = useCallback((s: string) => setLog((x) => [s, ...x].slice(0, 200)), []);

  const refreshHistory = useCallback(async () => {
    const out = await api.history();
    setHistory(out.entries);
  }, [api]);

  useEffect(() => {
    refreshHistory().catch((e) => pushLog(`ERR: ${e.message}`));
  }, [refreshHistory, pushLog]);

  async function clearHistory() {
    const out = await api.clearHistory();
    pushLog(`History cleared (${out.removed})`);
    await refreshHistory();
  }

  return (
    <div style={{ padding: 16, maxWidth: 900, margin: "0 auto", fontFamily: "system-ui" }}>
      <h2>Base Converter</h2>

      <ConverterPanel
        onConvert={async (req) => {
          const out = await api.convert(req);
          await refreshHistory();
          return out;
        }}
        onLog={pushLog}
      />

      <CalculatorPanel
        onCalculate={async (req) => {
          const out = await api.calculate(req);
          await refreshHistory();
          return out;
        }}
        onLog={pushLog}
      />

      <HistoryPanel
        entries={history}
        exportUrl={api.exportUrl}
        onRefresh={() => refreshHistory().catch((e) => pushLog(`ERR: ${e.message}`))}
        onClear={() => clearHistory().catch((e) => pushLog(`ERR: ${e.message}`))}
      />

      <div style={{ marginTop: 12, border: "1px solid #ddd", padding: 12, borderRadius: 10 }}>
        <b>Log</b>
        <div style={{ fontFamily: "monospace", fontSize: 12, whiteSpace: "pre-wrap", maxHeight: 260, overflow: "auto", marginTop: 8 }}>
          {log.map((x, i) => <div key={i}>{x}</div>)}
        </div>
      </div>

      <div style={{ marginTop: 12, fontSize: 12, opacity: 0.8 }}>
        Numbers take an optional sign and a 0x / 0b / 0o prefix. Digits are 0-9 then A-Z, any case.
      </div>
    </div>
  );
}
