import { ConfigurationError } from "../errors";
import { colorRgb, directionCode, earIndices, ledIndex, Rgb } from "./tables";

export const DEFAULT_TEMPO = 10;

export const ACTION_KINDS = { motor: 0, led: 1 } as const;

export type ActionRecord =
  | {
      timestamp: number;
      kind: "motor";
      ear: number;
      angle: number;
      direction: number;
    }
  | {
      timestamp: number;
      kind: "led";
      led: number;
      red: number;
      green: number;
      blue: number;
    };

export type ChoreographyProgram = (c: Choreography) => void;

function int(value: number): number {
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Expected a number, got ${value}`);
  }
  return Math.trunc(value);
}

function fields(action: ActionRecord): number[] {
  if (action.kind === "motor") {
    return [action.timestamp, ACTION_KINDS.motor, action.ear, action.angle, 0, action.direction];
  }
  return [action.timestamp, ACTION_KINDS.led, action.led, action.red, action.green, action.blue];
}

/**
 * Builds a choreography payload: a tempo followed by 6-field action records.
 *
 * Each leaf call (`moveEar`, `setLed`) is stamped with the current tick and
 * then moves the cursor on by one. Inside `group` and `repeatFor` the cursor
 * stays put until the block returns, so everything in the block shares a tick.
 *
 * ```ts
 * const chor = compileChoreography((c) => {
 *   c.setLed("top", "red");
 *   c.group((c) => {
 *     c.moveEar("both", 90);
 *     c.setLed("bottom", "off");
 *   });
 * });
 * ```
 */
export class Choreography {
  private tempo = DEFAULT_TEMPO;
  private cursor = 0;
  private inEvent = false;
  private records: ActionRecord[] = [];

  setTempo(hz: number): this {
    this.tempo = int(hz);
    return this;
  }

  /** Angle in degrees (0-180). Both ears count as one step. */
  moveEar(which: string, angle: number, direction = "forward"): this {
    const ears = earIndices(which);
    const code = directionCode(direction);
    const deg = int(angle);
    for (const ear of ears) {
      this.records.push({ timestamp: this.cursor, kind: "motor", ear, angle: deg, direction: code });
    }
    this.skip(1);
    return this;
  }

  /**
   * Colour is a name from the colour table, or literal red, green and blue
   * values (0-255).
   */
  setLed(which: string, color: string): this;
  setLed(which: string, red: number, green: number, blue: number): this;
  setLed(which: string, c1: string | number, c2?: number, c3?: number): this {
    const led = ledIndex(which);
    let rgb: Rgb;
    if (typeof c1 === "number" && c2 !== undefined && c3 !== undefined) {
      rgb = [int(c1), int(c2), int(c3)];
    } else {
      rgb = colorRgb(String(c1));
    }
    const [red, green, blue] = rgb;
    this.records.push({ timestamp: this.cursor, kind: "led", led, red, green, blue });
    this.skip(1);
    return this;
  }

  group(block: ChoreographyProgram): this {
    return this.repeatFor(1, block);
  }

  /** Runs the block at the current tick and holds it for `duration` ticks. */
  repeatFor(duration: number, block: ChoreographyProgram): this {
    const ticks = int(duration);
    const previous = this.inEvent;
    this.inEvent = true;
    try {
      block(this);
    } finally {
      this.inEvent = previous;
    }
    this.skip(ticks);
    return this;
  }

  get actions(): readonly ActionRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  emit(): string {
    return [this.tempo, ...this.records.flatMap(fields)].join(",");
  }

  private skip(duration: number) {
    if (!this.inEvent) this.cursor += duration;
  }
}

export function compileChoreography(program: ChoreographyProgram): string {
  const chor = new Choreography();
  program(chor);
  return chor.emit();
}
