import { toast } from "sonner";

/** User-facing messages raised by the editor and the commit engine. */
export interface Notifier {
  error: (title: string, message: string) => void;
  success: (message: string) => void;
  info: (message: string) => void;
}

export const toastNotifier: Notifier = {
  error: (title, message) => {
    toast.error(title, { description: message });
  },
  success: (message) => {
    toast.success(message);
  },
  info: (message) => {
    toast.info(message);
  },
};
