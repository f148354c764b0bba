import { z } from "zod";

export const projectPathSchema = z.string().min(1).max(240);
