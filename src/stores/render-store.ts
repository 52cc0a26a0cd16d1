import { createStore } from "zustand/vanilla";
import type { RenderStatus } from "@/types/render";

interface ProgressDetails {
  currentFrame?: number;
  totalFrames?: number;
  elapsedSeconds?: number;
}

export interface RenderJobState {
  status: RenderStatus;
  percentage: number;
  message: string;
  currentFrame: number;
  totalFrames: number;
  elapsedSeconds: number;
  outputPath: string | null;
  error: string | null;

  setStatus: (status: RenderStatus, message?: string) => void;
  setProgressDetails: (details: ProgressDetails) => void;
  setComplete: (outputPath: string) => void;
  setCancelled: (framesWritten: number) => void;
  setError: (error: string) => void;
  reset: () => void;
}

type JobFields = Omit<
  RenderJobState,
  "setStatus" | "setProgressDetails" | "setComplete" | "setCancelled" | "setError" | "reset"
>;

const initialState: JobFields = {
  status: "idle",
  percentage: 0,
  message: "",
  currentFrame: 0,
  totalFrames: 0,
  elapsedSeconds: 0,
  outputPath: null,
  error: null,
};

/** Progress for one render job. Subscribe with `store.subscribe`. */
export const createRenderJobStore = () =>
  createStore<RenderJobState>((set, get) => ({
    ...initialState,

    setStatus: (status, message) => set({ status, message: message ?? get().message }),
    setProgressDetails: (details) => {
      const currentFrame = details.currentFrame ?? get().currentFrame;
      const totalFrames = details.totalFrames ?? get().totalFrames;
      set({
        currentFrame,
        totalFrames,
        elapsedSeconds: details.elapsedSeconds ?? get().elapsedSeconds,
        percentage: totalFrames > 0 ? Math.round((currentFrame / totalFrames) * 100) : 0,
      });
    },
    setComplete: (outputPath) =>
      set({ outputPath, status: "complete", percentage: 100, message: `wrote ${outputPath}` }),
    setCancelled: (framesWritten) =>
      set({ status: "cancelled", message: `cancelled after ${framesWritten} frames` }),
    setError: (error) => set({ error, status: "error", message: error }),

    reset: () => set(initialState),
  }));

export type RenderJobStore = ReturnType<typeof createRenderJobStore>;
