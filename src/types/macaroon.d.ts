// The macaroon package ships no type declarations; this covers the part hostfleet calls.
declare module 'macaroon' {
  namespace macaroon {
    interface NewMacaroonParams {
      rootKey: Uint8Array | string
      identifier: Uint8Array | string
      location?: string
      version?: 1 | 2
    }

    interface Macaroon {
      addFirstPartyCaveat(caveatId: Uint8Array | string): void
      exportBinary(): Uint8Array
    }

    function newMacaroon(params: NewMacaroonParams): Macaroon
  }

  export = macaroon
}
