import React from 'react';
import { MAX_BASE, MIN_BASE, findNamedBase } from '@base-converter/shared';

const BASES = Array.from({ length: MAX_BASE - MIN_BASE + 1 }, (_, i) => i + MIN_BASE);

interface BaseSelectProps {
  id: string;
  value: string; // a base, or "auto"
  onChange: (v: string) => void;
  allowAuto?: boolean;
}

export const BaseSelect: React.FC<BaseSelectProps> = ({ id, value, onChange, allowAuto = false }) => {
  return (
    <select id={id} className="base-select" value={value} onChange={(e) => onChange(e.target.value)}>
      {allowAuto && <option value="auto">auto (prefix)</option>}
      {BASES.map((b) => {
        const named = findNamedBase(b);
        return (
          <option key={b} value={String(b)}>
            {named ? `${b} - ${named.name}` : String(b)}
          </option>
        );
      })}
    </select>
  );
};

export default BaseSelect;
