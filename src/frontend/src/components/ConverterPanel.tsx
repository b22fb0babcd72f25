import React, { useMemo, useState } from 'react';
import { baseName, detectBase, isConversionError, validate } from '@base-converter/shared';
import type { ConvertRequest, ConvertResponse } from '../types/api';
import { BaseSelect } from './BaseSelect';
import './ConverterPanel.css';

interface ConverterPanelProps {
  onConvert: (req: ConvertRequest) => Promise<ConvertResponse>;
  onLog?: (line: string) => void;
}

export const ConverterPanel: React.FC<ConverterPanelProps> = ({ onConvert, onLog }) => {
  const [number, setNumber] = useState('');
  const [fromBase, setFromBase] = useState('auto');
  const [toBase, setToBase] = useState('10');
  const [result, setResult] = useState<ConvertResponse | null>(null);
  const [error, setError] = useState('');
  const [busy, setBusy] = useState(false);

  const sourceBase = fromBase === 'auto' ? detectBase(number) : Number(fromBase);

  // validated locally as the user types; the server checks again
  const problem = useMemo(() => {
    if (!number.trim()) return '';
    try {
      validate(number, sourceBase);
      return '';
    } catch (e) {
      return isConversionError(e) ? e.message : String(e);
    }
  }, [number, sourceBase]);

  async function doConvert() {
    setBusy(true);
    setError('');
    try {
      const out = await onConvert({
        number,
        fromBase: fromBase === 'auto' ? undefined : Number(fromBase),
        toBase: Number(toBase),
      });
      setResult(out);
      onLog?.(`CONVERT ${out.input} (${out.fromBase}) -> ${out.output} (${out.toBase})`);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      setResult(null);
      setError(message);
      onLog?.(`ERR: ${message}`);
    } finally {
      setBusy(false);
    }
  }

  return (
    <div className="panel converter-panel">
      <b>Convert</b>
      <div className="panel-row">
        <label htmlFor="convert-number">Number</label>
        <input
          id="convert-number"
          placeholder="e.g. FF, 0b1010, -1A"
          value={number}
          onChange={(e) => setNumber(e.target.value)}
        />
        <label htmlFor="convert-from">From</label>
        <BaseSelect id="convert-from" value={fromBase} onChange={setFromBase} allowAuto />
        <label htmlFor="convert-to">To</label>
        <BaseSelect id="convert-to" value={toBase} onChange={setToBase} />
        <button disabled={busy || !number.trim() || problem !== ''} onClick={() => void doConvert()}>
          Convert
        </button>
      </div>

      {fromBase === 'auto' && number.trim() && (
        <div className="panel-hint">Detected: {baseName(sourceBase)}</div>
      )}
      {problem && <div className="panel-error" role="alert">{problem}</div>}
      {error && <div className="panel-error" role="alert">{error}</div>}

      {result && (
        <div className="panel-result">
          <output data-testid="convert-output">{result.output}</output>
          <span className="panel-decimal">decimal: {result.decimal}</span>
        </div>
      )}
    </div>
  );
};

export default ConverterPanel;
