/**
 * Result of an operation that can succeed or fail
 */
export type Result<T> =
	| { readonly success: true; readonly data: T }
	| { readonly success: false; readonly error: Error };

export const Result = {
	/**
	 * Creates a successful result
	 */
	success<T>(data: T): Result<T> {
		return { success: true, data };
	},

	/**
	 * Creates a failed result
	 */
	failure<T>(error: Error): Result<T> {
		return { success: false, error };
	},
};
