/**
 * Wraps a clock so it never steps backwards. Wall-clock corrections then shift later
 * timestamps forward instead of reordering them.
 *
 * @param source Underlying clock, `Date.now` by default.
 * @returns Clock returning the maximum of the source and every earlier reading.
 */
export const createMonotonicClock = (source: () => number = Date.now): (() => number) => {
  let last = Number.NEGATIVE_INFINITY

  return () => {
    last = Math.max(last, source())
    return last
  }
}
