import {
  DereferenceConfiguration,
  DereferenceConfigurationInput,
} from "@openapi-deref/core/configuration";
import { DefinitionsStore } from "../store/DefinitionsStore.js";
import { CycleGuard } from "./CycleGuard.js";

/**
 * State threaded through one top-level dereference call.
 */
export interface DereferenceContext {
  readonly store: DefinitionsStore;
  readonly guard: CycleGuard;
  readonly trace: (message: string) => void;
}

const noop = (): void => {};

export const createDereferenceContext = (
  store: DefinitionsStore,
  configuration: DereferenceConfigurationInput = {}
): DereferenceContext => {
  const config = DereferenceConfiguration.parse(configuration);

  return {
    store,
    guard: new CycleGuard(),
    trace: config["dereference.debug.trace"]
      ? (message) => console.debug(`[dereference] ${message}`)
      : noop,
  };
};
