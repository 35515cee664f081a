/**
 * InputController: turns raw pointer, wheel and key input into camera
 * commands. Holds only the drag state; the camera itself is untouched
 * here so the mapping stays testable without a DOM.
 *
 * Mouse:    left drag orbits, right/middle drag (or shift+left) pans, wheel zooms
 * Keyboard: R reset, I isometric, T top, F front, S side, O toggle projection
 */

import { PAN_SENSITIVITY, ROTATE_SENSITIVITY, WHEEL_NOTCH_PIXELS } from '../config';
import { createLogger } from '../core/logger';
import type { CameraCommand } from './cameraState';
import type { CameraPreset } from './cameraPresets';

const log = createLogger('Input');

export type InputAction =
  | { kind: 'command'; command: CameraCommand }
  | { kind: 'preset'; preset: CameraPreset };

type DragMode = 'orbit' | 'pan';

export interface InputSensitivity {
  rotate: number;
  pan: number;
}

const KEY_ACTIONS: Record<string, InputAction> = {
  KeyR: { kind: 'command', command: { type: 'reset' } },
  KeyO: { kind: 'command', command: { type: 'toggleProjection' } },
  KeyI: { kind: 'preset', preset: 'isometric' },
  KeyT: { kind: 'preset', preset: 'top' },
  KeyF: { kind: 'preset', preset: 'front' },
  KeyS: { kind: 'preset', preset: 'side' },
};

export class InputController {
  private drag: DragMode | null = null;
  private readonly sensitivity: InputSensitivity;

  constructor(sensitivity: Partial<InputSensitivity> = {}) {
    this.sensitivity = {
      rotate: sensitivity.rotate ?? ROTATE_SENSITIVITY,
      pan: sensitivity.pan ?? PAN_SENSITIVITY,
    };
  }

  get dragMode(): DragMode | null {
    return this.drag;
  }

  /** `button` follows MouseEvent.button: 0 left, 1 middle, 2 right. */
  pointerDown(button: number, shiftKey = false): void {
    if (button === 0) {
      this.drag = shiftKey ? 'pan' : 'orbit';
    } else if (button === 1 || button === 2) {
      this.drag = 'pan';
    }
  }

  pointerUp(): void {
    this.drag = null;
  }

  /**
   * Pointer motion in CSS pixels. Pan speed scales with camera distance so
   * a drag moves the terrain by roughly the same screen amount at any zoom.
   */
  pointerMove(dx: number, dy: number, distance: number): CameraCommand | null {
    if (this.drag === null || (dx === 0 && dy === 0)) return null;
    if (this.drag === 'orbit') {
      return {
        type: 'orbit',
        dAzimuth: -dx * this.sensitivity.rotate,
        dElevation: dy * this.sensitivity.rotate,
      };
    }
    const scale = distance * this.sensitivity.pan * 0.01;
    return { type: 'pan', dx: -dx * scale, dy: dy * scale };
  }

  /** Positive deltaY (wheel towards the user) zooms out. */
  wheel(deltaY: number): CameraCommand | null {
    if (deltaY === 0 || !Number.isFinite(deltaY)) return null;
    return { type: 'zoom', delta: -deltaY / WHEEL_NOTCH_PIXELS };
  }

  key(code: string): InputAction | null {
    return KEY_ACTIONS[code] ?? null;
  }
}

export type InputSink = (action: InputAction) => void;

function isFormField(target: EventTarget | null): boolean {
  return (
    target instanceof HTMLInputElement ||
    target instanceof HTMLSelectElement ||
    target instanceof HTMLTextAreaElement
  );
}

/**
 * Attach DOM listeners feeding `controller` into `sink`.
 * `distance` is read on every move so pan speed tracks the live camera.
 * Returns a function that removes every listener.
 */
export function bindInput(
  element: HTMLElement,
  controller: InputController,
  distance: () => number,
  sink: InputSink,
): () => void {
  const onPointerDown = (e: PointerEvent): void => {
    controller.pointerDown(e.button, e.shiftKey);
    element.setPointerCapture?.(e.pointerId);
  };
  const onPointerMove = (e: PointerEvent): void => {
    const command = controller.pointerMove(e.movementX, e.movementY, distance());
    if (command) sink({ kind: 'command', command });
  };
  const onPointerUp = (e: PointerEvent): void => {
    controller.pointerUp();
    element.releasePointerCapture?.(e.pointerId);
  };
  const onWheel = (e: WheelEvent): void => {
    e.preventDefault();
    const command = controller.wheel(e.deltaY);
    if (command) sink({ kind: 'command', command });
  };
  const onKeyDown = (e: KeyboardEvent): void => {
    if (isFormField(e.target) || e.ctrlKey || e.metaKey || e.altKey) return;
    const action = controller.key(e.code);
    if (action) {
      log.debug(`key ${e.code}`);
      sink(action);
    }
  };
  const onContextMenu = (e: MouseEvent): void => e.preventDefault();

  element.addEventListener('pointerdown', onPointerDown);
  element.addEventListener('pointermove', onPointerMove);
  element.addEventListener('pointerup', onPointerUp);
  element.addEventListener('pointercancel', onPointerUp);
  element.addEventListener('wheel', onWheel, { passive: false });
  element.addEventListener('contextmenu', onContextMenu);
  window.addEventListener('keydown', onKeyDown);

  return () => {
    element.removeEventListener('pointerdown', onPointerDown);
    element.removeEventListener('pointermove', onPointerMove);
    element.removeEventListener('pointerup', onPointerUp);
    element.removeEventListener('pointercancel', onPointerUp);
    element.removeEventListener('wheel', onWheel);
    element.removeEventListener('contextmenu', onContextMenu);
    window.removeEventListener('keydown', onKeyDown);
  };
}
