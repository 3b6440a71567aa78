'use client';

// ————————————————————————————————————————————
// Landing Prompt Generator
// Brandboard + approved copy screenshots → one structured prompt for Lovable.
// ————————————————————————————————————————————

import { useEffect, useState, type ChangeEvent } from 'react';
import { brandSwatches, labelColor } from '@/lib/colors';
import { downloadText } from '@/lib/download';
import { describeError, errorMessage } from '@/lib/errors';
import { PROMPT_FILENAME } from '@/lib/prompt';
import { readEvents } from '@/lib/stream';
import type { BrandInfo, PipelineEvent, PipelineStep } from '@/lib/types';

function cx(...c: (string | false | undefined)[]) { return c.filter(Boolean).join(' '); }

const ACCEPT = '.png,.jpg,.jpeg,.webp';

const stepLabel: Record<PipelineStep, string> = {
  brand: '🔍 Analizando brandboard...',
  copy: '📝 Transcribiendo copy...',
  sections: '🏗️ Estructurando secciones...',
};

type Health = { hasKey: boolean; model: string };

export default function Page() {
  // --- Uploads ---
  const [brandFiles, setBrandFiles] = useState<File[]>([]);
  const [copyFiles, setCopyFiles] = useState<File[]>([]);

  // --- Run state ---
  const [running, setRunning] = useState(false);
  const [progress, setProgress] = useState<string[]>([]);
  const [msg, setMsg] = useState<string | null>(null);
  const [health, setHealth] = useState<Health | null>(null);

  // --- Results ---
  const [brandInfo, setBrandInfo] = useState<BrandInfo | null>(null);
  const [brandParsed, setBrandParsed] = useState(true);
  const [rawCopy, setRawCopy] = useState('');
  const [prompt, setPrompt] = useState('');
  const [tookMs, setTookMs] = useState<number | null>(null);
  const [copied, setCopied] = useState(false);

  useEffect(() => {
    fetch('/api/generate', { cache: 'no-store' })
      .then(r => r.json())
      .then((j: Health) => setHealth(j))
      .catch(() => setHealth(null));
  }, []);

  const pick = (set: (f: File[]) => void) => (e: ChangeEvent<HTMLInputElement>) =>
    set(Array.from(e.target.files ?? []));

  function onEvent(ev: PipelineEvent) {
    switch (ev.type) {
      case 'step':
        setProgress(p => [...p, stepLabel[ev.step]]);
        break;
      case 'brand':
        setBrandInfo(ev.brandInfo);
        setBrandParsed(ev.parsed);
        break;
      case 'copy':
        setRawCopy(ev.rawCopy);
        break;
      case 'sections':
        setProgress(p => [...p, '✨ Generando prompt final...']);
        break;
      case 'done':
        setPrompt(ev.prompt);
        setTookMs(ev.tookMs);
        break;
      case 'error':
        throw new Error(describeError(ev.error));
    }
  }

  async function generate() {
    // Same checks the server runs; saves a round trip.
    if (!brandFiles.length) { setMsg('⚠️ Sube al menos una imagen del brandboard'); return; }
    if (!copyFiles.length) { setMsg('⚠️ Sube al menos una imagen del copy'); return; }

    setRunning(true); setMsg(null); setProgress([]);
    setBrandInfo(null); setRawCopy(''); setPrompt(''); setTookMs(null); setCopied(false);

    const form = new FormData();
    brandFiles.forEach(f => form.append('brandboard', f));
    copyFiles.forEach(f => form.append('copy', f));

    let finished = false;
    try {
      const r = await fetch('/api/generate', { method: 'POST', body: form });
      if (!r.ok || !r.body) {
        const j = await r.json().catch(() => ({}));
        throw new Error(typeof j.error === 'string' ? j.error : `Request failed (${r.status})`);
      }
      await readEvents(r.body, ev => {
        onEvent(ev);
        if (ev.type === 'done') finished = true;
      });
      if (!finished) throw new Error('La generación se interrumpió. Inténtalo de nuevo.');
    } catch (e) {
      setMsg(errorMessage(e));
    } finally {
      setRunning(false);
    }
  }

  async function copyPrompt() {
    try {
      await navigator.clipboard.writeText(prompt);
      setCopied(true);
    } catch (e) {
      setMsg(`No se pudo copiar: ${errorMessage(e)}`);
    }
  }

  const swatches = brandInfo ? brandSwatches(brandInfo) : [];

  return (
    <main className="container">
      <h1>🎨 Generador de Prompts para Lovable</h1>
      <p className="muted">Sube las capturas del brandboard y del copy para generar un prompt estructurado.</p>

      {health && !health.hasKey && (
        <div className="alert alert-error">
          ⚠️ No se encontró OPENROUTER_API_KEY. Configúrala como secret o variable de entorno.
        </div>
      )}

      <section className="grid-2">
        <div className="card">
          <h2>📋 Brandboard / Manual de Marca</h2>
          <p className="muted small">Sube capturas del manual de marca (colores, tipografía, estilo)</p>
          <input type="file" accept={ACCEPT} multiple onChange={pick(setBrandFiles)} />
          {brandFiles.length > 0 && <p className="ok small">✅ {brandFiles.length} imagen(es) subida(s)</p>}
        </div>
        <div className="card">
          <h2>📝 Copy de la Landing</h2>
          <p className="muted small">Sube capturas del copy aprobado (todas las secciones)</p>
          <input type="file" accept={ACCEPT} multiple onChange={pick(setCopyFiles)} />
          {copyFiles.length > 0 && <p className="ok small">✅ {copyFiles.length} imagen(es) subida(s)</p>}
        </div>
      </section>

      <button className={cx('btn-primary', running && 'is-busy')} onClick={generate} disabled={running}>
        {running ? 'Procesando imágenes...' : '🚀 Generar Prompt para Lovable'}
      </button>

      {msg && <div className="alert alert-error">{msg}</div>}

      {progress.length > 0 && (
        <ul className="progress">
          {progress.map((p, i) => <li key={i}>{p}</li>)}
        </ul>
      )}

      {brandInfo && (
        <details className="card" open>
          <summary>📊 Información de marca extraída</summary>
          {!brandParsed && (
            <p className="alert alert-warn small">La respuesta no era JSON válido; revisa las notas adicionales.</p>
          )}
          {swatches.length > 0 && (
            <div className="swatches">
              {swatches.map(s => (
                <span key={s.key} className="swatch" style={{ background: s.hex, color: labelColor(s.hex) }}>
                  {s.key} {s.hex}
                </span>
              ))}
            </div>
          )}
          <pre>{JSON.stringify(brandInfo, null, 2)}</pre>
        </details>
      )}

      {rawCopy && (
        <details className="card">
          <summary>📄 Copy extraído (texto crudo)</summary>
          <pre>{rawCopy}</pre>
        </details>
      )}

      {prompt && (
        <section className="card">
          <p className="ok">✅ ¡Prompt generado!{tookMs !== null && <span className="muted small"> ({(tookMs / 1000).toFixed(1)} s)</span>}</p>
          <h2>📋 Prompt para Lovable</h2>
          <label className="muted small" htmlFor="result">
            Copia este prompt y pégalo en Lovable junto con las imágenes del brandboard
          </label>
          <textarea id="result" rows={24} value={prompt} onChange={e => { setPrompt(e.target.value); setCopied(false); }} />
          <div className="row">
            <button onClick={copyPrompt}>{copied ? '✅ Copiado' : '📋 Copiar'}</button>
            <button onClick={() => downloadText(PROMPT_FILENAME, prompt)}>📥 Descargar prompt como archivo</button>
          </div>
        </section>
      )}

      <hr />
      <p className="muted small">
        💡 <strong>Tip:</strong> Recuerda subir también las imágenes del brandboard a Lovable junto con este prompt.
      </p>
    </main>
  );
}
