import React, { createContext, useContext } from "react";
import type { ScrollController } from "../viewport/ScrollController";

const PrimaryScrollControllerContext = createContext<ScrollController | null>(null);

export interface PrimaryScrollControllerProps {
  controller: ScrollController | null;
  children?: React.ReactNode;
}

/**
 * Makes `controller` the ambient controller for descendant scroll views that opt into it with
 * `primary` (or that have no controller of their own on their main axis).
 */
export function PrimaryScrollController(props: PrimaryScrollControllerProps): React.ReactElement {
  return (
    <PrimaryScrollControllerContext.Provider value={props.controller}>{props.children}</PrimaryScrollControllerContext.Provider>
  );
}

export function usePrimaryScrollController(): ScrollController | null {
  return useContext(PrimaryScrollControllerContext);
}
