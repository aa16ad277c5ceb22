const ETH_IMPLICIT_LEN = 42
const NEAR_DETERMINISTIC_LEN = 42
const NEAR_IMPLICIT_LEN = 64

function isLowerHexFrom(id: string, start: number): boolean {
  for (let i = start; i < id.length; i++) {
    const code = id.charCodeAt(i)
    const isDigit = code >= 0x30 && code <= 0x39
    const isLowerHexLetter = code >= 0x61 && code <= 0x66

    if (!isDigit && !isLowerHexLetter) return false
  }

  return true
}

/** `0x` followed by 40 lowercase hex digits: an address derived from a secp256k1 key. */
export function isEthImplicit(id: string): boolean {
  return id.length === ETH_IMPLICIT_LEN && id.startsWith("0x") && isLowerHexFrom(id, 2)
}

/** `0s` followed by 40 lowercase hex digits: derived from a contract's initial state. */
export function isNearDeterministic(id: string): boolean {
  return (
    id.length === NEAR_DETERMINISTIC_LEN && id.startsWith("0s") && isLowerHexFrom(id, 2)
  )
}

/** 64 lowercase hex digits: the hex encoding of an ed25519 public key. */
export function isNearImplicit(id: string): boolean {
  return id.length === NEAR_IMPLICIT_LEN && isLowerHexFrom(id, 0)
}
