// src/components/MediaUpload.tsx
// Single-file picker for the image or video slot

import React, { useRef } from 'react';
import { mediaKindOf } from '../chatForm';
import type { MediaKind } from '../types';

interface MediaUploadProps {
  kind: MediaKind;
  accept: string;
  file: File | null;
  onChange: (file: File | null) => void;
  disabled?: boolean;
}

export const MediaUpload: React.FC<MediaUploadProps> = ({ kind, accept, file, onChange, disabled }) => {
  const inputRef = useRef<HTMLInputElement>(null);
  const label = kind === 'image' ? 'Image' : 'Video';

  const handleChange = (event: React.ChangeEvent<HTMLInputElement>) => {
    const picked = event.target.files?.[0] ?? null;
    if (picked && mediaKindOf(picked.name) !== kind) {
      // The server answers unsupported formats itself; this only flags the mismatch early.
      console.warn('[MediaUpload] Unexpected file type for slot:', { kind, name: picked.name });
    }
    onChange(picked);
  };

  const clear = () => {
    if (inputRef.current) inputRef.current.value = '';
    onChange(null);
  };

  return (
    <div className="media-upload">
      <label className="media-upload-label">
        {label}
        <input
          ref={inputRef}
          type="file"
          accept={accept}
          onChange={handleChange}
          disabled={disabled}
        />
      </label>
      {file && (
        <div className="media-upload-selected">
          <span title={file.name}>{file.name}</span>
          <button type="button" onClick={clear} disabled={disabled} aria-label={`Remove ${kind}`}>
            ×
          </button>
        </div>
      )}
    </div>
  );
};
