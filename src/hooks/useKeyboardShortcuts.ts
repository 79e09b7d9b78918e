import { useEffect } from "react";

/**
 * Keyboard shortcuts of the module editor.
 *
 * - Delete: triggers `onDelete` unless focus is in a form field.
 */
export function useKeyboardShortcuts(onDelete: (() => void) | null) {
  useEffect(() => {
    if (!onDelete) return;
    function handler(e: KeyboardEvent) {
      const target = e.target;
      if (
        target instanceof HTMLInputElement ||
        target instanceof HTMLSelectElement ||
        target instanceof HTMLTextAreaElement
      ) {
        return;
      }
      if (e.key === "Delete") {
        e.preventDefault();
        onDelete?.();
      }
    }
    document.addEventListener("keydown", handler);
    return () => document.removeEventListener("keydown", handler);
  }, [onDelete]);
}
