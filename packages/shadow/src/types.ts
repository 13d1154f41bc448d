/**
 * sysconfig Shadow — Type Definitions
 *
 * One record of the shadow password database:
 *
 *   username:password:lastchg:min:max:warn:inactive:expire:flag
 *
 * @see shadow(5)
 */

/**
 * Credential state encoded in the password field.
 *
 * The three sentinels are matched against the whole field; any other
 * value is kept verbatim as a hash.
 */
export type PasswordState =
  | { readonly kind: 'locked' }
  | { readonly kind: 'no_login' }
  | { readonly kind: 'no_password' }
  | { readonly kind: 'hashed'; readonly hash: string };

/**
 * One account record.
 *
 * Aging fields are `null` when the field is empty in the source. An empty
 * field means "unset" and is never folded into `0`.
 */
export interface ShadowEntry {
  readonly username: string;
  readonly password: PasswordState;
  /** Days since the epoch of the last password change. */
  readonly lastChange: number | null;
  /** Minimum days between password changes. */
  readonly minAge: number | null;
  /** Maximum days a password stays valid. */
  readonly maxAge: number | null;
  /** Days of warning before the password expires. */
  readonly warnPeriod: number | null;
  /** Days after expiry before the account is disabled. */
  readonly inactivePeriod: number | null;
  /** Days since the epoch when the account expires. */
  readonly expireDate: number | null;
  /** Reserved. */
  readonly flag: number | null;
}

export interface ShadowDocument {
  readonly entries: ReadonlyArray<ShadowEntry>;
}
