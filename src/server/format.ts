import type { AlertFeature, ForecastPeriod } from "../types/response"

// 格式化单条警报内容为字符串
export function formatAlert(feature: AlertFeature): string {
  const props = feature.properties
  return [
    `Event: ${props.event ?? "Unknown"}`,
    `Area: ${props.areaDesc ?? "Unknown"}`,
    `Severity: ${props.severity ?? "Unknown"}`,
    `Description: ${props.description ?? "No description available"}`,
    `Instructions: ${props.instruction ?? "No specific instructions provided"}`,
  ].join("\n")
}

// 格式化单个预报时段
export function formatForecastPeriod(period: ForecastPeriod): string {
  return [
    `${period.name}:`,
    `Temperature: ${period.temperature}°${period.temperatureUnit}`,
    `Wind: ${period.windSpeed} ${period.windDirection}`,
    `Forecast: ${period.detailedForecast}`,
  ].join("\n")
}
