// src/components/ChatInterface.tsx
// Chat page: transcript, attachment pickers, prompt box and sampling sliders

import React, { useState } from 'react';
import { DEFAULT_SAMPLING, IMAGE_ACCEPT, VIDEO_ACCEPT } from '../chatForm';
import { submitChat } from '../smartFetch';
import type { SamplingConfig, Transcript } from '../types';
import { MediaUpload } from './MediaUpload';
import { SamplingControls } from './SamplingControls';
import { TranscriptView } from './TranscriptView';

export const ChatInterface: React.FC = () => {
  const [history, setHistory] = useState<Transcript>([]);
  const [text, setText] = useState('');
  const [image, setImage] = useState<File | null>(null);
  const [video, setVideo] = useState<File | null>(null);
  const [sampling, setSampling] = useState<SamplingConfig>(DEFAULT_SAMPLING);
  const [isSending, setIsSending] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const handleSubmit = async (event?: { preventDefault(): void }) => {
    event?.preventDefault();
    if (isSending) return;

    setIsSending(true);
    setError(null);
    try {
      await submitChat({ text, history, image, video, sampling }, setHistory);
      setText('');
    } catch (err) {
      console.error('[ChatInterface] Submit failed:', err);
      setError(err instanceof Error ? err.message : 'Chat request failed');
    } finally {
      setIsSending(false);
    }
  };

  const handleKeyDown = (event: React.KeyboardEvent<HTMLTextAreaElement>) => {
    if (event.key === 'Enter' && !event.shiftKey) {
      void handleSubmit(event);
    }
  };

  return (
    <div className="chat-page">
      <header className="chat-header">
        <h1>Gemini Media Chat</h1>
      </header>

      <TranscriptView history={history} pending={isSending} />

      {error && <div className="chat-error" role="alert">{error}</div>}

      <form className="chat-form" onSubmit={(event) => void handleSubmit(event)}>
        <div className="chat-attachments">
          <MediaUpload kind="image" accept={IMAGE_ACCEPT} file={image} onChange={setImage} disabled={isSending} />
          <MediaUpload kind="video" accept={VIDEO_ACCEPT} file={video} onChange={setVideo} disabled={isSending} />
        </div>

        <textarea
          className="chat-input"
          value={text}
          onChange={(event) => setText(event.target.value)}
          onKeyDown={handleKeyDown}
          placeholder="Type a message (Shift+Enter for a new line)"
          rows={3}
          disabled={isSending}
        />

        <SamplingControls value={sampling} onChange={setSampling} disabled={isSending} />

        <div className="chat-actions">
          <button type="submit" disabled={isSending}>
            {isSending ? 'Sending…' : 'Submit'}
          </button>
          <button type="button" onClick={() => window.location.reload()}>
            Refresh
          </button>
        </div>
      </form>
    </div>
  );
};
