class OkResult<T> {
	private readonly contents: T;

	constructor(contents: T) {
		this.contents = contents;
	}

	isOk(): this is OkResult<T> {
		return true;
	}

	isErr(): this is ErrResult<never> {
		return false;
	}

	unwrap(): T {
		return this.contents;
	}
}

class ErrResult<U> {
	private readonly contents: U;

	constructor(contents: U) {
		this.contents = contents;
	}

	isOk(): this is OkResult<never> {
		return false;
	}

	isErr(): this is ErrResult<U> {
		return true;
	}

	unwrapErr(): U {
		return this.contents;
	}
}

export type Result<T, U> = OkResult<T> | ErrResult<U>;

export function resultOf<T, U>(value: T): Result<T, U> {
	return new OkResult(value);
}

export function resultOfErr<T, U>(value: U): Result<T, U> {
	return new ErrResult(value);
}
