import type { z } from "zod"
import {
  alertFeatureSchema,
  forecastPeriodSchema,
  forecastResponseSchema,
  pointsResponseSchema,
} from "../types/response"
import { NWS_API_BASE, type FetchResult, type JsonObject, type NWSRequest } from "./api"
import { UpstreamShapeError } from "./errors"
import { formatAlert, formatForecastPeriod } from "./format"

export const BLOCK_SEPARATOR = "\n--\n"
export const MAX_FORECAST_PERIODS = 5

export const MESSAGES = {
  alertsUnavailable: "Unable to fetch alerts or no alerts found.",
  noActiveAlerts: "No active alerts for this state.",
  pointsUnavailable: "Unable to fetch points data for this location",
  noForecastUrl: "No forecast data available for this location",
  forecastUnavailable: "Unable to get forecast data for this location",
} as const

export interface WeatherHandlers {
  getAlerts(state: string): Promise<string>
  getForecast(latitude: number, longitude: number): Promise<string>
}

// 空对象与请求失败同等对待
function dataOf(result: FetchResult): JsonObject | undefined {
  if (!result.ok || Object.keys(result.data).length === 0) return undefined
  return result.data
}

function parseUpstream<S extends z.ZodTypeAny>(schema: S, value: unknown, context: string): z.infer<S> {
  const parsed = schema.safeParse(value)
  if (!parsed.success) throw UpstreamShapeError.fromZodError(context, parsed.error)
  return parsed.data
}

export function createWeatherHandlers(request: NWSRequest, baseUrl: string = NWS_API_BASE): WeatherHandlers {
  async function getAlerts(state: string): Promise<string> {
    const data = dataOf(await request(`${baseUrl}/alerts/active/area/${state}`))

    const features = data?.features
    if (!Array.isArray(features)) return MESSAGES.alertsUnavailable
    if (features.length === 0) return MESSAGES.noActiveAlerts

    return features
      .map((feature) => formatAlert(parseUpstream(alertFeatureSchema, feature, "alert feature")))
      .join(BLOCK_SEPARATOR)
  }

  async function getForecast(latitude: number, longitude: number): Promise<string> {
    // 先获取当前坐标所对应的 forecast URL
    const pointsData = dataOf(await request(`${baseUrl}/points/${latitude},${longitude}`))
    if (!pointsData) return MESSAGES.pointsUnavailable

    const points = parseUpstream(pointsResponseSchema, pointsData, "points response")
    const forecastUrl = points.properties?.forecast
    if (!forecastUrl) return MESSAGES.noForecastUrl

    // 请求天气预报数据
    const forecastData = dataOf(await request(forecastUrl))
    if (!forecastData) return MESSAGES.forecastUnavailable

    const forecast = parseUpstream(forecastResponseSchema, forecastData, "forecast response")
    const periods = forecast.properties?.periods ?? []

    return periods
      .slice(0, MAX_FORECAST_PERIODS)
      .map((period) => formatForecastPeriod(parseUpstream(forecastPeriodSchema, period, "forecast period")))
      .join(BLOCK_SEPARATOR)
  }

  return { getAlerts, getForecast }
}
