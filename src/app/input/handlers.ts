import type { Orchestrator } from "@/app/orchestrator";
import type { StateStore } from "@/app/state/store";
import type { EventBatcher, InputAction } from "./event-batcher";
import { isChar, type KeyEvent } from "./keys";
import type { NavigationStep } from "./navigation-batcher";

export interface InputContext {
  store: StateStore;
  orchestrator: Orchestrator;
}

export type HandleOutcome = "continue" | "quit";

const LOG_PAGE = 10;

function repeat(times: number, fn: () => void): void {
  for (let i = 0; i < times; i++) fn();
}

function handleNormalNavigation(step: NavigationStep, ctx: InputContext): void {
  const selectionMoved = ctx.store.update((state) => {
    // Two panels: an odd horizontal count switches once.
    if (Math.abs(step.dx) % 2 === 1) state.nextPanel();

    if (step.dy === 0) return step.dx !== 0;
    if (state.focusedPanel === "logArea") {
      if (step.dy < 0) state.logs.scrollUp(-step.dy);
      else state.logs.scrollDown(step.dy);
      return step.dx !== 0;
    }

    state.moveBy(step.dy);
    return true;
  });

  if (selectionMoved) ctx.orchestrator.syncLogStream();
}

function handleNormalKey(event: KeyEvent, ctx: InputContext): HandleOutcome {
  const { store, orchestrator } = ctx;

  if (event.key === "char" && event.ctrl) {
    return event.char === "c" ? "quit" : "continue";
  }

  switch (event.key) {
    case "escape":
      store.update((state) => state.notifications.clear());
      return "continue";
    case "tab":
      store.update((state) => state.nextPanel());
      orchestrator.syncLogStream();
      return "continue";
    case "backtab":
      store.update((state) => state.toggleFocus());
      return "continue";
    case "enter":
      orchestrator.toggleSelectedDevice();
      return "continue";
    case "pageup":
      store.update((state) => state.logs.scrollUp(LOG_PAGE));
      return "continue";
    case "pagedown":
      store.update((state) => state.logs.scrollDown(LOG_PAGE));
      return "continue";
    case "home":
      store.update((state) => state.logs.scrollToTop());
      return "continue";
    case "end":
      store.update((state) => state.logs.scrollToBottom());
      return "continue";
    case "char":
      break;
    default:
      return "continue";
  }

  switch (event.char) {
    case "q":
      return "quit";
    case "r":
      store.update((state) => state.requestRefresh());
      break;
    case "f":
      store.update((state) => state.logs.cycleFilter());
      break;
    case "F":
      store.update((state) => state.logs.toggleFullscreen());
      break;
    case "L":
      store.update((state) => {
        state.logs.clear();
        state.notifyInfo("Logs cleared");
      });
      break;
    case "S":
      store.update((state) => state.logs.toggleAutoScroll());
      break;
    case "c":
      orchestrator.openCreateForm();
      break;
    case "d":
      store.update((state) => state.openConfirm("ConfirmDelete"));
      break;
    case "w":
      store.update((state) => state.openConfirm("ConfirmWipe"));
      break;
    case "a":
      orchestrator.openApiLevelManager();
      break;
    case "?":
      store.update((state) => {
        state.mode = "Help";
      });
      break;
  }
  return "continue";
}

function handleCreateForm(action: InputAction, ctx: InputContext): void {
  const { store, orchestrator } = ctx;

  if (action.type === "navigate") {
    const { dx, dy } = action.step;
    store.update(({ createDeviceForm: form }) => {
      repeat(Math.abs(dy), () => (dy > 0 ? form.focusNext() : form.focusPrevious()));
      repeat(Math.abs(dx), () => (dx > 0 ? form.selectNext() : form.selectPrevious()));
    });
    return;
  }

  const event = action.event;
  switch (event.key) {
    case "escape":
      store.update((state) => {
        if (!state.createDeviceForm.isCreating) state.closeDialog();
      });
      return;
    case "enter":
      orchestrator.submitCreateForm();
      return;
    case "tab":
      store.update((state) => state.createDeviceForm.focusNext());
      return;
    case "backtab":
      store.update((state) => state.createDeviceForm.focusPrevious());
      return;
    case "backspace":
      store.update((state) => state.createDeviceForm.backspace());
      return;
    case "char":
      if (event.char && !event.ctrl) {
        const char = event.char;
        store.update((state) => state.createDeviceForm.inputChar(char));
      }
      return;
    default:
      return;
  }
}

function handleConfirm(event: KeyEvent, ctx: InputContext): void {
  if (isChar(event, "y") || isChar(event, "Y")) {
    ctx.orchestrator.confirmDialog();
  } else if (isChar(event, "n") || isChar(event, "N") || event.key === "escape") {
    ctx.store.update((state) => state.closeDialog());
  }
}

function handleApiLevels(action: InputAction, ctx: InputContext): void {
  if (action.type === "navigate") {
    const dy = action.step.dy;
    ctx.store.update((state) => state.moveApiLevelSelection(dy));
    return;
  }

  const event = action.event;
  if (event.key === "escape" || isChar(event, "q")) {
    ctx.store.update((state) => state.closeDialog());
  } else if (event.key === "enter") {
    ctx.orchestrator.toggleSelectedApiLevel();
  }
}

/** Routes one input action by the current mode. */
export function handleAction(action: InputAction, ctx: InputContext): HandleOutcome {
  const mode = ctx.store.read((state) => state.mode);

  switch (mode) {
    case "Normal":
      if (action.type === "navigate") {
        handleNormalNavigation(action.step, ctx);
        return "continue";
      }
      return handleNormalKey(action.event, ctx);
    case "CreateDevice":
      handleCreateForm(action, ctx);
      return "continue";
    case "ConfirmDelete":
    case "ConfirmWipe":
      if (action.type === "key") handleConfirm(action.event, ctx);
      return "continue";
    case "ManageApiLevels":
      handleApiLevels(action, ctx);
      return "continue";
    case "Help":
      if (action.type === "key") ctx.store.update((state) => state.closeDialog());
      return "continue";
  }
}

/** h/j/k/l navigate everywhere except while typing into the form. */
export function lettersNavigate(store: StateStore): () => boolean {
  return () => store.read((state) => state.mode !== "CreateDevice");
}

export function dispatch(
  batcher: EventBatcher,
  event: KeyEvent | null,
  ctx: InputContext
): HandleOutcome {
  const actions = event ? batcher.push(event) : batcher.poll();
  for (const action of actions) {
    if (handleAction(action, ctx) === "quit") return "quit";
  }
  return "continue";
}
