// src/components/SamplingControls.tsx

import React from 'react';
import { clampSample, SLIDERS } from '../chatForm';
import type { SamplingConfig } from '../types';

interface SamplingControlsProps {
  value: SamplingConfig;
  onChange: (value: SamplingConfig) => void;
  disabled?: boolean;
}

export const SamplingControls: React.FC<SamplingControlsProps> = ({ value, onChange, disabled }) => (
  <fieldset className="sampling-controls" disabled={disabled}>
    <legend>Generation settings</legend>
    {SLIDERS.map((slider) => (
      <label key={slider.key} className="sampling-slider">
        <span className="sampling-slider-label">
          {slider.label}
          <output>{value[slider.key]}</output>
        </span>
        <input
          type="range"
          min={slider.min}
          max={slider.max}
          step={slider.step}
          value={value[slider.key]}
          onChange={(event) =>
            onChange({ ...value, [slider.key]: clampSample(slider, Number(event.target.value)) })}
        />
      </label>
    ))}
  </fieldset>
);
