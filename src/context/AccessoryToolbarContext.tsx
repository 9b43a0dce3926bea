import { createContext, useContext, type ReactNode } from "react";

import type { AccessoryToolbarStore } from "../state/accessoryToolbarStore";

const AccessoryToolbarContext = createContext<AccessoryToolbarStore | undefined>(undefined);

interface AccessoryToolbarProviderProps {
  store: AccessoryToolbarStore;
  children: ReactNode;
}

export function AccessoryToolbarProvider({ store, children }: AccessoryToolbarProviderProps) {
  return <AccessoryToolbarContext.Provider value={store}>{children}</AccessoryToolbarContext.Provider>;
}

/**
 * The toolbar has no fallback dependencies; it must be given a store created
 * by `createAccessoryToolbarStore`.
 */
export function useAccessoryToolbarStore(): AccessoryToolbarStore {
  const store = useContext(AccessoryToolbarContext);
  if (!store) {
    throw new Error("useAccessoryToolbarStore must be used within an AccessoryToolbarProvider");
  }
  return store;
}
