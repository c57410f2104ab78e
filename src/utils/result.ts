/**
 * Resultado tipado para operaciones que pueden fallar.
 *
 * Encaje en el sistema:
 * - Lo usan el motor de canales temporales, el adaptador de plataforma y la fachada de comandos
 *   para modelar errores sin usar `throw` en paths de runtime.
 *
 * Contrato:
 * - `ok` es el discriminante: tras `isOk()` / `isErr()` (o `if (res.ok)`) se accede a `value` o `error`.
 * - No hay `unwrap()` que pueda fallar.
 *
 * Ejemplo:
 * ```ts
 * const res = await platform.createChannel(params);
 * if (res.isErr()) return ErrResult(res.error);
 * const channelId = res.value;
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
    readonly ok = true;

    constructor(public readonly value: T) { }

    isOk(): this is Ok<T, E> {
        return true;
    }

    isErr(): this is Err<T, E> {
        return false;
    }
}

export class Err<T, E> {
    readonly ok = false;

    constructor(public readonly error: E) { }

    isOk(): this is Ok<T, E> {
        return false;
    }

    isErr(): this is Err<T, E> {
        return true;
    }
}

/** Crea un resultado exitoso. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok<T, E>(value);

/** Crea un resultado fallido. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err<T, E>(error);
