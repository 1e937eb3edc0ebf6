import type { EnvironmentAccessor } from './EnvironmentAccessor';
import { validateEnvName } from './validateEnvName';

export const processEnvironment: EnvironmentAccessor = {
	get(key) {
		return Object.prototype.hasOwnProperty.call(process.env, key)
			? process.env[key]
			: undefined;
	},
	set(key, value) {
		validateEnvName(key);
		process.env[key] = value;
	},
	unset(key) {
		delete process.env[key];
	},
	has(key) {
		return Object.prototype.hasOwnProperty.call(process.env, key);
	},
	keys() {
		return Object.keys(process.env);
	},
};
