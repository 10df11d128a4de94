import { useCallback, useSyncExternalStore } from "react";
import type { EditingController } from "../core/controller";
import type { EditingValue } from "../core/types";

/** Re-renders whenever the controller commits a new value. */
export function useEditingValue(controller: EditingController): EditingValue {
  const subscribe = useCallback(
    (onStoreChange: () => void) => controller.subscribe(() => onStoreChange()),
    [controller],
  );
  const getSnapshot = useCallback(() => controller.value, [controller]);
  return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
}
