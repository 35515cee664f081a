/**
 * Application entry point.
 *
 * Creates the TerrainViewer and Engine, binds input and the settings
 * panel, loads the terrain (`?file=<url>` for an .fdf file, otherwise a
 * procedural grid sized by `?size=` and `?seed=`), and starts the loop.
 * `?log=debug` raises the log level.
 */

import { parseColorScheme, COLOR_SCHEME_KINDS } from './core/colorSchemes';
import { createLogger, parseLogLevel, setLogLevel } from './core/logger';
import { degToRad } from './core/math';
import { CAMERA_PRESETS, parseCameraPreset } from './camera/cameraPresets';
import { bindInput, InputController } from './camera/inputController';
import { DEFAULT_CHUNK_SIZE, DEFAULT_FOV_DEG, DEFAULT_PROCEDURAL_SIZE, validateAndLoadConfig } from './config';
import { Engine } from './engine/Engine';
import { TerrainViewer, type ConfigEvent } from './engine/TerrainViewer';
import { RENDER_STYLES, type RenderStyle } from './rendering/terrainRenderer';
import { getStartupChecks, summarizeStartupChecks } from './startup';
import { WorkerPool } from './workers/workerPool';
import { fetchFdf, formatFdfError } from './world/fdfLoader';

const log = createLogger('Main');

// ── URL Parameters ───────────────────────────────────────────────

function intParam(params: URLSearchParams, name: string, fallback: number): number {
  const raw = params.get(name);
  if (raw === null) return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

// ── HUD ──────────────────────────────────────────────────────────

interface Hud {
  root: HTMLDivElement;
  setStatus(text: string): void;
  setStats(text: string): void;
  dispose(): void;
}

function select(id: string, options: readonly string[], initial: string): string {
  const items = options
    .map((o) => `<option value="${o}"${o === initial ? ' selected' : ''}>${o}</option>`)
    .join('');
  return `<select id="${id}">${items}</select>`;
}

function createHud(mountPoint: HTMLElement): Hud {
  const root = document.createElement('div');
  root.id = 'hud';
  root.innerHTML = `
    <div class="row"><strong>Relief</strong> <span id="status">Loading...</span></div>
    <div class="row" id="stats"></div>
    <div class="row">Colors ${select('scheme', COLOR_SCHEME_KINDS, 'terrain')}</div>
    <div class="row">Normals ${select('normals', ['smooth', 'flat'], 'smooth')}</div>
    <div class="row">Style ${select('style', RENDER_STYLES, 'shaded')}</div>
    <div class="row">Projection ${select('projection', ['perspective', 'orthographic'], 'perspective')}</div>
    <div class="row">View ${select('preset', CAMERA_PRESETS, 'isometric')}</div>
    <div class="row">Height scale <input id="heightScale" type="number" step="0.1" value="1" /></div>
    <div class="row">Chunk size <input id="chunkSize" type="number" min="2" step="1" value="${DEFAULT_CHUNK_SIZE}" /></div>
    <div class="row">FOV <input id="fov" type="range" min="10" max="120" value="${DEFAULT_FOV_DEG}" /></div>
    <div class="row">Drag: orbit · Shift/right drag: pan · Wheel: zoom · R I O T F S · Tab: panel</div>
  `;
  mountPoint.appendChild(root);

  const status = root.querySelector<HTMLSpanElement>('#status');
  const stats = root.querySelector<HTMLDivElement>('#stats');

  return {
    root,
    setStatus(text) {
      if (status) status.textContent = text;
    },
    setStats(text) {
      if (stats) stats.textContent = text;
    },
    dispose() {
      root.remove();
    },
  };
}

function bindPanel(hud: Hud, viewer: TerrainViewer, engine: Engine): void {
  const apply = (event: ConfigEvent): void => {
    viewer.applyConfig(event).catch((e: unknown) => log.error('Config change failed:', e));
  };
  const on = <T extends HTMLElement>(id: string, handler: (el: T) => void): void => {
    const el = hud.root.querySelector<T>(`#${id}`);
    if (el) el.addEventListener('change', () => handler(el));
  };

  on<HTMLSelectElement>('scheme', (el) => {
    const scheme = parseColorScheme(el.value);
    if (scheme) apply({ type: 'colorScheme', scheme });
  });
  on<HTMLSelectElement>('normals', (el) => {
    apply({ type: 'normalMode', mode: el.value === 'flat' ? 'flat' : 'smooth' });
  });
  on<HTMLSelectElement>('style', (el) => {
    const style = RENDER_STYLES.find((s): s is RenderStyle => s === el.value);
    if (style) engine.terrainRenderer.setStyle(style);
  });
  on<HTMLSelectElement>('projection', (el) => {
    apply({ type: 'projection', kind: el.value === 'orthographic' ? 'orthographic' : 'perspective' });
  });
  on<HTMLSelectElement>('preset', (el) => {
    const preset = parseCameraPreset(el.value);
    if (preset) apply({ type: 'cameraPreset', preset });
  });
  on<HTMLInputElement>('heightScale', (el) => {
    const scale = Number.parseFloat(el.value);
    if (Number.isFinite(scale)) apply({ type: 'heightScale', scale });
  });
  on<HTMLInputElement>('chunkSize', (el) => {
    const size = Number.parseInt(el.value, 10);
    if (Number.isFinite(size) && size >= 2) apply({ type: 'chunkSize', size });
  });
  on<HTMLInputElement>('fov', (el) => {
    const deg = Number.parseFloat(el.value);
    if (Number.isFinite(deg)) apply({ type: 'fov', fovY: degToRad(deg) });
  });
}

// ── Bootstrap ────────────────────────────────────────────────────

async function init(): Promise<void> {
  const app = document.querySelector<HTMLDivElement>('#app');
  if (!app) throw new Error('App mount point #app missing');

  const params = new URLSearchParams(window.location.search);
  const logLevel = parseLogLevel(params.get('log')) ?? 'info';
  setLogLevel(logLevel);

  const report = getStartupChecks({ logLevel });
  log.info(summarizeStartupChecks(report));
  if (!report.ok) {
    app.textContent = summarizeStartupChecks(report);
    return;
  }

  const workersAvailable = report.checks.some((c) => c.name === 'web-workers' && c.passed);
  const { config } = validateAndLoadConfig({ logLevel });
  const pool = workersAvailable ? new WorkerPool(config.workerCount) : null;
  const viewer = new TerrainViewer({ config, pool });

  const engine = new Engine(app, viewer);
  await engine.init();

  const hud = createHud(app);
  bindPanel(hud, viewer, engine);

  // ── Events ──────────────────────────────────────────────────

  const unsubs = [
    viewer.events.on('terrain_rebuilt', (e) => {
      hud.setStatus(`${e.mode}, ${e.chunkCount} chunks, built in ${e.buildMs.toFixed(0)}ms`);
    }),
    viewer.events.on('resource_limit', (w) => hud.setStatus(w.message)),
    viewer.events.on('build_failed', (e) => hud.setStatus(`Build failed: ${e.message}`)),
  ];

  // ── Input ───────────────────────────────────────────────────

  const controller = new InputController({
    rotate: viewer.config.rotateSensitivity,
    pan: viewer.config.panSensitivity,
  });
  const unbindInput = bindInput(
    engine.canvas,
    controller,
    () => viewer.camera.getState().distance,
    (action) => viewer.handleInput(action),
  );
  const onTab = (e: KeyboardEvent): void => {
    if (e.code === 'Tab') {
      e.preventDefault();
      hud.root.classList.toggle('hidden');
    }
  };
  window.addEventListener('keydown', onTab);

  // ── Stats ───────────────────────────────────────────────────

  let lastStats = 0;
  engine.onFrame((now) => {
    if (now - lastStats < 250) return;
    lastStats = now;
    const s = viewer.stats();
    hud.setStats(
      `${s.fps} fps · ${s.visibleChunks}/${s.chunkCount} chunks · ` +
      `${s.visibleTriangles.toLocaleString()}/${s.triangleCount.toLocaleString()} tris`,
    );
  });

  engine.onDispose(() => {
    for (const unsub of unsubs) unsub();
    unbindInput();
    window.removeEventListener('keydown', onTab);
    hud.dispose();
    viewer.dispose();
    pool?.dispose();
  });

  engine.start();

  // ── Terrain ─────────────────────────────────────────────────

  const file = params.get('file');
  if (file) {
    const result = await fetchFdf(file);
    if (result.ok) {
      await viewer.load(result.value);
      return;
    }
    hud.setStatus(`${file}: ${formatFdfError(result.error)}; showing procedural terrain`);
  }

  const size = intParam(params, 'size', DEFAULT_PROCEDURAL_SIZE);
  await viewer.regenerate({ width: size, height: size, seed: intParam(params, 'seed', 1) });
}

init().catch((e: unknown) => {
  console.error('Failed to initialize:', e);
});
