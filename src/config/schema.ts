/**
 * Config file schema.
 *
 * Every key is optional; CLI flags override whatever the file sets.
 * Unknown keys are rejected so typos surface instead of being ignored.
 */

import { z } from "zod";

export const FileConfigSchema = z
	.object({
		ignore: z.array(z.string()).optional(),
		count: z.number().int().positive().optional(),
		barSize: z.number().int().positive().optional(),
		moreThan: z.number().int().nonnegative().optional(),
		wrappers: z.array(z.string().min(1)).optional(),
		format: z.string().optional(),
	})
	.strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;
