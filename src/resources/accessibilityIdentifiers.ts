export const KEYBOARD_ACCESSORY_IDS = {
  toolbar: "keyboardAccessory.toolbar",
  previousButton: "keyboardAccessory.previousButton",
  nextButton: "keyboardAccessory.nextButton",
  doneButton: "keyboardAccessory.doneButton",
  creditCardAutofillButton: "keyboardAccessory.creditCardAutofillButton",
  addressAutofillButton: "keyboardAccessory.addressAutofillButton",
  loginAutofillButton: "keyboardAccessory.loginAutofillButton"
} as const;
