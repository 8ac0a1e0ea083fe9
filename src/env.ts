import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const optionalSecret = z
	.string()
	.optional()
	.transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const VitalsyncEnvSchema = z.object({
	clientId: z.string({ required_error: "WITHINGS_CLIENT_ID is not configured" }).trim().min(1, {
		message: "WITHINGS_CLIENT_ID is not configured",
	}),
	clientSecret: z
		.string({ required_error: "WITHINGS_CLIENT_SECRET is not configured" })
		.trim()
		.min(1, { message: "WITHINGS_CLIENT_SECRET is not configured" }),
	encryptionKey: z.string({ required_error: "VITALSYNC_ENCRYPTION_KEY is not configured" }),
	adminToken: optionalSecret,
	railway: z.object({
		apiToken: optionalSecret,
		projectId: optionalSecret,
		environmentId: optionalSecret,
		serviceId: optionalSecret,
	}),
	port: z.coerce.number().int().min(1).max(65535).optional(),
});

export type VitalsyncEnv = z.infer<typeof VitalsyncEnvSchema>;
export type RailwayEnv = VitalsyncEnv["railway"];

/**
 * Read and validate the secrets this process needs from the environment.
 *
 * Client credentials and the encryption key are required; the admin token and
 * the Railway settings are optional (their features are disabled without them).
 * The encryption key is only checked for presence here; the cipher validates its shape.
 */
export function readEnv(source: NodeJS.ProcessEnv = process.env): VitalsyncEnv {
	const result = VitalsyncEnvSchema.safeParse({
		clientId: source.WITHINGS_CLIENT_ID,
		clientSecret: source.WITHINGS_CLIENT_SECRET,
		encryptionKey: source.VITALSYNC_ENCRYPTION_KEY,
		adminToken: source.ADMIN_API_TOKEN,
		railway: {
			apiToken: source.RAILWAY_API_TOKEN,
			projectId: source.RAILWAY_PROJECT_ID,
			environmentId: source.RAILWAY_ENVIRONMENT_ID,
			serviceId: source.RAILWAY_SERVICE_ID,
		},
		port: source.PORT || undefined,
	});

	if (!result.success) {
		const details = result.error.errors.map((e) => e.message).join("; ");
		throw new ConfigurationError(`Invalid environment: ${details}`);
	}

	return result.data;
}
