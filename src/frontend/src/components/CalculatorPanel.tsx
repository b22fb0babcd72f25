import React, { useState } from 'react';
import { OPERATIONS, OPERATION_SYMBOLS, isOperation, type Operation } from '@base-converter/shared';
import type { CalculateRequest, CalculateResponse } from '../types/api';
import { BaseSelect } from './BaseSelect';
import './ConverterPanel.css';

interface CalculatorPanelProps {
  onCalculate: (req: CalculateRequest) => Promise<CalculateResponse>;
  onLog?: (line: string) => void;
}

export const CalculatorPanel: React.FC<CalculatorPanelProps> = ({ onCalculate, onLog }) => {
  const [left, setLeft] = useState('');
  const [right, setRight] = useState('');
  const [operation, setOperation] = useState<Operation>('add');
  const [base, setBase] = useState('10');
  const [result, setResult] = useState<CalculateResponse | null>(null);
  const [error, setError] = useState('');

  async function doCalculate() {
    setError('');
    try {
      const out = await onCalculate({ operation, left, right, base: Number(base) });
      setResult(out);
      onLog?.(`CALC ${out.expression}`);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      setResult(null);
      setError(message);
      onLog?.(`ERR: ${message}`);
    }
  }

  return (
    <div className="panel calculator-panel">
      <b>Calculate</b>
      <div className="panel-row">
        <label htmlFor="calc-left">Left</label>
        <input id="calc-left" value={left} onChange={(e) => setLeft(e.target.value)} />
        <label htmlFor="calc-op">Operation</label>
        <select
          id="calc-op"
          value={operation}
          onChange={(e) => {
            if (isOperation(e.target.value)) setOperation(e.target.value);
          }}
        >
          {OPERATIONS.map((op) => (
            <option key={op} value={op}>
              {OPERATION_SYMBOLS[op]} {op}
            </option>
          ))}
        </select>
        <label htmlFor="calc-right">Right</label>
        <input id="calc-right" value={right} onChange={(e) => setRight(e.target.value)} />
        <label htmlFor="calc-base">Base</label>
        <BaseSelect id="calc-base" value={base} onChange={setBase} />
        <button disabled={!left.trim() || !right.trim()} onClick={() => void doCalculate()}>
          Calculate
        </button>
      </div>

      {error && <div className="panel-error" role="alert">{error}</div>}

      {result && (
        <div className="panel-result">
          <output data-testid="calc-output">{result.expression}</output>
          <span className="panel-decimal">decimal: {result.decimal}</span>
        </div>
      )}
    </div>
  );
};

export default CalculatorPanel;
