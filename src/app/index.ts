import { INPUT } from "@/constants";
import type { Managers } from "@/types/operation";
import type { CommandExecutor } from "@/utils/exec";
import { TerminalRenderer, type Renderer } from "@/ui/renderer";
import { TerminalInput } from "@/ui/terminal";
import { EventBatcher } from "./input/event-batcher";
import { dispatch, lettersNavigate, type HandleOutcome, type InputContext } from "./input/handlers";
import { Orchestrator } from "./orchestrator";
import { AppState } from "./state";
import { StateStore } from "./state/store";

export interface AppOptions {
  managers: Managers;
  executor: CommandExecutor;
  iosSupported: boolean;
  refreshIntervalMs?: number;
}

/** Redraws at most once per event-loop turn. */
function scheduleRenders(store: StateStore, renderer: Renderer): () => void {
  let scheduled = false;
  return store.subscribe(() => {
    if (scheduled) return;
    scheduled = true;
    setImmediate(() => {
      scheduled = false;
      store.read((state) => renderer.render(state));
    });
  });
}

export async function runApp(options: AppOptions): Promise<void> {
  const state = new AppState({
    iosSupported: options.iosSupported,
    refreshIntervalMs: options.refreshIntervalMs,
  });
  const store = new StateStore(state);
  const orchestrator = new Orchestrator(store, options.managers, options.executor);
  const renderer = new TerminalRenderer();
  const input = new TerminalInput();
  const batcher = new EventBatcher({ lettersNavigate: lettersNavigate(store) });
  const context: InputContext = { store, orchestrator };

  if (!options.iosSupported) {
    store.update((s) => s.notifyInfo("iOS simulators are only available on macOS"));
  }

  const unsubscribe = scheduleRenders(store, renderer);
  const controller = new AbortController();

  renderer.enter();
  input.start();
  const refreshLoop = orchestrator.runLoop(controller.signal);

  try {
    store.read((s) => renderer.render(s));

    let outcome: HandleOutcome = "continue";
    while (outcome === "continue") {
      for (const event of input.drain()) {
        outcome = dispatch(batcher, event, context);
        if (outcome === "quit") break;
      }
      if (outcome === "continue") outcome = dispatch(batcher, null, context);
      if (outcome === "continue") {
        await new Promise((resolve) => setTimeout(resolve, INPUT.pollIntervalMs));
      }
    }
  } finally {
    controller.abort();
    unsubscribe();
    input.stop();
    renderer.leave();
    await refreshLoop;
    await orchestrator.shutdown();
  }
}
