import { lerp } from "../../engine/selection/selection-geometry";
import {
  FRAME_INTERVAL,
  decelerate,
  intervalFrameScheduler,
  type FrameScheduler,
} from "./floating-cursor";

export const CURSOR_BLINK_HALF_PERIOD = 500;
export const CURSOR_BLINK_WAIT_FOR_START = 150;
export const CURSOR_FADE_DURATION = 250;
/** Blink ticks an obscured field keeps its latest character visible for. */
export const OBSCURE_SHOW_CHAR_TICKS = 3;

export type CaretBlinkOptions = {
  /** Whether the caret fades; a fading caret waits before its first blink. */
  opacityAnimates: boolean;
  /** Keeps the caret solid and never schedules a timer. */
  deterministic?: boolean;
  /** Drives the fade of an animated caret. */
  scheduleFrames?: FrameScheduler;
};

export type CaretBlinkListener = () => void;

type Timer = ReturnType<typeof setInterval>;

type Fade = { from: number; to: number; elapsed: number; cancel: () => void };

export class CaretBlinkAnimator {
  private readonly opacityAnimates: boolean;
  private readonly deterministic: boolean;
  private readonly scheduleFrames: FrameScheduler;
  private timer: Timer | null = null;
  private fade: Fade | null = null;
  private running = false;
  private showCursor = false;
  private opacityValue = 0;
  private listeners = new Set<CaretBlinkListener>();
  private disposed = false;

  obscureShowCharTicksPending = 0;
  obscureLatestCharIndex: number | null = null;

  constructor(options: CaretBlinkOptions) {
    this.opacityAnimates = options.opacityAnimates;
    this.deterministic = options.deterministic ?? false;
    this.scheduleFrames = options.scheduleFrames ?? intervalFrameScheduler;
  }

  get visible(): boolean {
    return this.showCursor;
  }

  /** Caret opacity; eases toward the blink target when the caret fades. */
  get opacity(): number {
    return this.opacityValue;
  }

  get isRunning(): boolean {
    return this.running;
  }

  subscribe(listener: CaretBlinkListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  start(): void {
    if (this.disposed) {
      return;
    }
    this.clearTimer();
    this.running = true;
    this.setVisible(true);
    if (this.deterministic) {
      return;
    }
    if (this.opacityAnimates) {
      this.timer = setInterval(() => {
        this.clearTimer();
        this.timer = setInterval(() => this.tick(), CURSOR_BLINK_HALF_PERIOD);
      }, CURSOR_BLINK_WAIT_FOR_START);
    } else {
      this.timer = setInterval(() => this.tick(), CURSOR_BLINK_HALF_PERIOD);
    }
  }

  stop(resetCharTicks = true): void {
    this.clearTimer();
    this.running = false;
    if (resetCharTicks) {
      this.obscureShowCharTicksPending = 0;
      this.obscureLatestCharIndex = null;
    }
    this.setVisible(false);
  }

  /** Restarts the cycle with a solid caret, as after typing. */
  restart(): void {
    this.stop(false);
    this.start();
  }

  update(state: { hasFocus: boolean; selectionCollapsed: boolean }): void {
    const shouldRun = state.hasFocus && state.selectionCollapsed;
    if (shouldRun && !this.running) {
      this.start();
    } else if (!shouldRun && this.running) {
      this.stop();
    }
  }

  /** Keeps the character at `index` readable for the next few ticks. */
  showLatestObscuredCharacter(index: number): void {
    this.obscureLatestCharIndex = index;
    this.obscureShowCharTicksPending = OBSCURE_SHOW_CHAR_TICKS;
    this.restart();
  }

  tick(): void {
    this.showCursor = !this.showCursor;
    const target = this.showCursor ? 1 : 0;
    if (this.opacityAnimates && !this.deterministic) {
      this.startFade(target);
    } else {
      this.cancelFade();
      this.opacityValue = target;
    }
    if (this.obscureShowCharTicksPending > 0) {
      this.obscureShowCharTicksPending -= 1;
      if (this.obscureShowCharTicksPending === 0) {
        this.obscureLatestCharIndex = null;
      }
    }
    this.notify();
  }

  dispose(): void {
    this.clearTimer();
    this.cancelFade();
    this.running = false;
    this.disposed = true;
    this.listeners.clear();
  }

  private setVisible(visible: boolean): void {
    this.cancelFade();
    const opacity = visible ? 1 : 0;
    if (this.showCursor === visible && this.opacityValue === opacity) {
      return;
    }
    this.showCursor = visible;
    this.opacityValue = opacity;
    this.notify();
  }

  private startFade(to: number): void {
    this.cancelFade();
    const fade: Fade = {
      from: this.opacityValue,
      to,
      elapsed: 0,
      cancel: this.scheduleFrames(() => {
        fade.elapsed += FRAME_INTERVAL;
        const t = Math.min(1, fade.elapsed / CURSOR_FADE_DURATION);
        this.opacityValue = lerp(fade.from, fade.to, decelerate(t));
        if (t === 1) {
          this.cancelFade();
        }
        this.notify();
      }),
    };
    this.fade = fade;
  }

  private cancelFade(): void {
    this.fade?.cancel();
    this.fade = null;
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private notify(): void {
    for (const listener of Array.from(this.listeners)) {
      listener();
    }
  }
}
