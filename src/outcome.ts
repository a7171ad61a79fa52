export type RejectionKind = 'validation' | 'not_found' | 'conflict' | 'locked';

export interface Rejection {
    kind: RejectionKind;
    reason: string;
}

/*
    Les refus attendus (formulaire vide, fil verrouillé...) sont des valeurs, pas des exceptions:
    c'est la couche HTTP qui choisit comment les présenter.
    Les pannes (disque, base) restent des exceptions.
*/
export type Outcome<T> =
    { ok: true; value: T } |
    { ok: false; error: Rejection };

export let accept = <T>(value: T): Outcome<T> => ({ ok: true, value });

export let reject = (kind: RejectionKind, reason: string): { ok: false; error: Rejection } =>
    ({ ok: false, error: { kind, reason } });
