import { z } from "zod";

export interface Bar {
  time: number; // timestamp ms
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export const BarSchema = z.object({
  time: z.number(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number(),
});
