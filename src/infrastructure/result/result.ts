/**
 * Outcome of a tool operation: the response it produced, or the error that
 * stopped it. Narrow on `success` before reading `data` or `error`.
 */
export type Result<T> =
	| { readonly success: true; readonly data: T }
	| { readonly success: false; readonly error: Error };

export const Result = {
	success<T>(data: T): Result<T> {
		return { success: true, data };
	},

	failure<T>(error: Error): Result<T> {
		return { success: false, error };
	},

	/**
	 * Applies `fn` to a successful outcome; failures pass through untouched
	 */
	map<T, U>(result: Result<T>, fn: (data: T) => U): Result<U> {
		return result.success ? Result.success(fn(result.data)) : result;
	},
};
