import { useEffect, type CSSProperties, type PointerEvent } from "react";
import { useStore } from "zustand";

import { useAccessoryToolbarStore } from "../context/AccessoryToolbarContext";
import { KEYBOARD_ACCESSORY_IDS } from "../resources/accessibilityIdentifiers";
import { ICONS } from "../resources/icons";
import { KEYBOARD_ACCESSORY_STRINGS } from "../resources/strings";
import { CONTEXTUAL_BUTTONS } from "../state/layout";
import type { AccessoryAction, ToolbarItem } from "../types";

interface AccessoryToolbarProps {
  className?: string;
}

const buttonStyle: CSSProperties = {
  border: "none",
  backgroundColor: "transparent",
  padding: "0 8px",
  height: "100%",
  cursor: "pointer"
};

// Keeps focus (and the on-screen keyboard) on the active field.
function keepFocus(event: PointerEvent<HTMLButtonElement>) {
  event.preventDefault();
}

/**
 * AccessoryToolbar renders the strip above the on-screen keyboard: an optional
 * autofill suggestion followed by previous, next and done.
 *
 * Mounting attaches the store and unmounting detaches it, which resets the
 * contextual button. Call `reload` after the toolbar has mounted; under
 * `<StrictMode>` the development-only remount clears a kind set beforehand.
 */
export function AccessoryToolbar({ className }: AccessoryToolbarProps) {
  const store = useAccessoryToolbarStore();
  const items = useStore(store, (state) => state.items);
  const tint = useStore(store, (state) => state.tint);
  const config = useStore(store, (state) => state.config);
  const tap = useStore(store, (state) => state.tap);

  useEffect(() => {
    store.getState().attach();
    return () => {
      store.getState().detach();
    };
  }, [store]);

  const spacerStyle = (width: number): CSSProperties => ({
    width,
    height: config.fixedSpacerHeight,
    flexShrink: 0
  });

  const navigationButton = (action: AccessoryAction, label: string, icon: string, testId: string) => (
    <button
      key={action}
      type="button"
      aria-label={label}
      data-testid={testId}
      style={{ ...buttonStyle, color: tint.navigationTint }}
      tabIndex={-1}
      onPointerDown={keepFocus}
      onClick={() => tap(action)}
    >
      <span aria-hidden="true">{icon}</span>
    </button>
  );

  const renderItem = (item: ToolbarItem) => {
    switch (item.type) {
      case "contextual": {
        const descriptor = CONTEXTUAL_BUTTONS[item.button];
        const buttonTint = tint.contextual[item.button];
        return (
          <button
            key={`contextual-${item.button}`}
            type="button"
            aria-label={descriptor.label}
            data-testid={descriptor.accessibilityId}
            className="accessory-autofill-button"
            style={{ ...buttonStyle, backgroundColor: buttonTint.background, borderRadius: 8 }}
            tabIndex={-1}
      onPointerDown={keepFocus}
            onClick={() => tap(descriptor.action)}
          >
            <span aria-hidden="true" style={{ color: buttonTint.iconTint, marginRight: 6 }}>
              {descriptor.icon}
            </span>
            <span>{descriptor.label}</span>
          </button>
        );
      }
      case "flexibleSpacer":
        return <span key="flexible-spacer" aria-hidden="true" style={{ flex: 1 }} />;
      case "previous":
        return navigationButton(
          "previous",
          KEYBOARD_ACCESSORY_STRINGS.previousButtonLabel,
          ICONS.chevronUp,
          KEYBOARD_ACCESSORY_IDS.previousButton
        );
      case "next":
        return navigationButton(
          "next",
          KEYBOARD_ACCESSORY_STRINGS.nextButtonLabel,
          ICONS.chevronDown,
          KEYBOARD_ACCESSORY_IDS.nextButton
        );
      case "fixedSpacer":
        return <span key="fixed-spacer" aria-hidden="true" style={spacerStyle(item.width)} />;
      case "done":
        return (
          <button
            key="done"
            type="button"
            data-testid={KEYBOARD_ACCESSORY_IDS.doneButton}
            style={{
              ...buttonStyle,
              color: tint.navigationTint,
              fontSize: config.doneButtonFontSize,
              fontWeight: 600
            }}
            tabIndex={-1}
      onPointerDown={keepFocus}
            onClick={() => tap("done")}
          >
            {KEYBOARD_ACCESSORY_STRINGS.done}
          </button>
        );
    }
  };

  return (
    <div
      className={className}
      role="toolbar"
      aria-label={KEYBOARD_ACCESSORY_STRINGS.toolbarLabel}
      data-testid={KEYBOARD_ACCESSORY_IDS.toolbar}
      style={{
        display: "flex",
        alignItems: "center",
        height: config.toolbarHeight,
        backgroundColor: tint.background
      }}
    >
      <span aria-hidden="true" style={spacerStyle(config.leadingSpacerWidth)} />
      {items.map(renderItem)}
      <span aria-hidden="true" style={spacerStyle(config.trailingSpacerWidth)} />
    </div>
  );
}
