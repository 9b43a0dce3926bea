export const KEYBOARD_ACCESSORY_STRINGS = {
  previousButtonLabel: "Previous form field",
  nextButtonLabel: "Next form field",
  done: "Done",
  useSavedCard: "Use saved card",
  useSavedAddress: "Use saved address",
  useSavedPassword: "Use saved password",
  toolbarLabel: "Keyboard accessory"
} as const;
