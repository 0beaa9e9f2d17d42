// src/components/TranscriptView.tsx
// Renders the transcript: user turns with their media, model turns as plain text

import React, { useEffect, useRef } from 'react';
import { omittedMediaNotice } from '../chatForm';
import type { Transcript, TurnContent } from '../types';

interface TranscriptViewProps {
  history: Transcript;
  pending: boolean;
}

const UserTurn: React.FC<{ content: TurnContent }> = ({ content }) => (
  <div className="message user">
    {content.media?.kind === 'image' && (
      <img className="message-media" src={content.media.dataUrl} alt="Uploaded image" />
    )}
    {content.media?.kind === 'video' && (
      <video className="message-media" src={content.media.dataUrl} controls />
    )}
    {content.omittedMedia && (
      <div className="message-omitted">{omittedMediaNotice(content.omittedMedia)}</div>
    )}
    <div className="message-text">{content.text}</div>
  </div>
);

export const TranscriptView: React.FC<TranscriptViewProps> = ({ history, pending }) => {
  const endRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    endRef.current?.scrollIntoView({ behavior: 'smooth' });
  }, [history.length, pending]);

  return (
    <section className="transcript" aria-live="polite">
      {history.map(([user, model], index) =>
        user
          ? <UserTurn key={index} content={user} />
          : model && (
            <div key={index} className="message model">
              <div className="message-text">{model.text}</div>
            </div>
          )
      )}
      {pending && <div className="message model pending">Thinking…</div>}
      <div ref={endRef} />
    </section>
  );
};
