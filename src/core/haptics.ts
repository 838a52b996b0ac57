export interface DragFeedback {
  lift: () => void;
  hover: () => void;
  drop: () => void;
}

const LIFT_PATTERN = 50;
const HOVER_PATTERN = 10;
const DROP_PATTERN = [50, 50, 50];

type Vibrating = { vibrate?: (pattern: number | number[]) => boolean };

export function createNavigatorHaptics(nav: Vibrating | undefined = globalThis.navigator): DragFeedback {
  const vibrate = (pattern: number | number[]) => {
    if (nav && typeof nav.vibrate === 'function') {
      nav.vibrate(pattern);
    }
  };

  return {
    lift: () => vibrate(LIFT_PATTERN),
    hover: () => vibrate(HOVER_PATTERN),
    drop: () => vibrate(DROP_PATTERN),
  };
}
