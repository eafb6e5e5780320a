import { useEffect, useState } from "react"

export const useAnimationClock = (enabled: boolean, intervalMs = 120): number => {
  const [tick, setTick] = useState(0)

  useEffect(() => {
    if (!enabled) {
      setTick(0)
      return
    }
    const timer = setInterval(() => setTick((value) => value + 1), intervalMs)
    return () => clearInterval(timer)
  }, [enabled, intervalMs])

  return enabled ? tick : 0
}
