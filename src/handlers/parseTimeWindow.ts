"use strict"

const timeWindowPattern = /^(\d+)([dhms])$/

//Parses a time window such as 90s, 25m, 36h or 7d into milliseconds
export function parseTimeWindow (windowStr: string): number {
  const m = timeWindowPattern.exec(windowStr)
  if (m)
  {
    const count = Number(m[1])

    switch (m[2])
    {
      case "d":
        return count * 24 * 3_600_000
      case "h":
        return count * 3_600_000
      case "m":
        return count * 60_000
      case "s":
        return count * 1_000
    }
  }

  throw new Error("Cannot parse time window length")
}
