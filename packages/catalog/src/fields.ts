import type { ConfigField, FieldOption } from "./entities";

/**
 * The `{ value, label }` choices of a select field.
 *
 * Entries without a string value and label are skipped; a field without
 * an `options` array has no choices.
 */
export function fieldOptions(field: Pick<ConfigField, "attributes">): FieldOption[] {
	const options = field.attributes?.options;
	if (!Array.isArray(options)) return [];

	const result: FieldOption[] = [];
	for (const option of options) {
		if (typeof option !== "object" || option === null || Array.isArray(option)) continue;
		const { value, label } = option;
		if (typeof value === "string" && typeof label === "string") {
			result.push({ value, label });
		}
	}
	return result;
}
