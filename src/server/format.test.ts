import { describe, expect, it } from "vitest"
import { formatAlert, formatForecastPeriod } from "./format"

describe("formatAlert", () => {
  it("renders every alert field", () => {
    const text = formatAlert({
      properties: {
        event: "Flood Warning",
        areaDesc: "Sample County",
        severity: "Severe",
        description: "River above flood stage.",
        instruction: "Avoid low-lying roads.",
      },
    })

    expect(text).toBe(
      [
        "Event: Flood Warning",
        "Area: Sample County",
        "Severity: Severe",
        "Description: River above flood stage.",
        "Instructions: Avoid low-lying roads.",
      ].join("\n"),
    )
  })

  it("falls back when fields are missing or null", () => {
    const text = formatAlert({ properties: { event: null, description: null } })

    expect(text).toBe(
      [
        "Event: Unknown",
        "Area: Unknown",
        "Severity: Unknown",
        "Description: No description available",
        "Instructions: No specific instructions provided",
      ].join("\n"),
    )
  })

  it("keeps an empty string as given", () => {
    expect(formatAlert({ properties: { severity: "" } }).split("\n")[2]).toBe("Severity: ")
  })
})

describe("formatForecastPeriod", () => {
  it("renders the period block", () => {
    const text = formatForecastPeriod({
      name: "Tonight",
      temperature: 48,
      temperatureUnit: "F",
      windSpeed: "5 to 10 mph",
      windDirection: "SW",
      detailedForecast: "Mostly clear.",
    })

    expect(text).toBe("Tonight:\nTemperature: 48°F\nWind: 5 to 10 mph SW\nForecast: Mostly clear.")
  })
})
