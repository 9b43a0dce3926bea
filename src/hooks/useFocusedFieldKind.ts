import { useEffect } from "react";

import type { AccessoryToolbarStore } from "../state/accessoryToolbarStore";
import { classifyField } from "../utils/fieldClassification";

// Input types that bring up the on-screen keyboard.
const KEYBOARD_INPUT_TYPES = new Set(["text", "search", "email", "tel", "url", "password", "number"]);

/**
 * useFocusedFieldKind reloads the toolbar whenever a text input or textarea
 * inside `root` gains focus.
 */
export function useFocusedFieldKind(store: AccessoryToolbarStore, root?: EventTarget) {
  useEffect(() => {
    const target: EventTarget = root ?? document;

    const onFocusIn = (event: Event) => {
      const element = event.target;
      if (element instanceof HTMLInputElement) {
        if (!KEYBOARD_INPUT_TYPES.has(element.type)) {
          return;
        }
        store.getState().reload(
          classifyField({ autocomplete: element.getAttribute("autocomplete"), type: element.type })
        );
      } else if (element instanceof HTMLTextAreaElement) {
        store.getState().reload(classifyField({ autocomplete: element.getAttribute("autocomplete") }));
      }
    };

    target.addEventListener("focusin", onFocusIn);
    return () => {
      target.removeEventListener("focusin", onFocusIn);
    };
  }, [store, root]);
}
