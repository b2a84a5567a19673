import { z } from "zod"

// 定义 NWS 接口返回的数据结构，运行时用 zod 校验，类型由 schema 推导

// 单条告警 (GeoJSON Feature)，properties 内的字段都可能缺失或为 null
export const alertFeatureSchema = z.object({
  properties: z.object({
    event: z.string().nullish(),
    areaDesc: z.string().nullish(),
    severity: z.string().nullish(),
    description: z.string().nullish(),
    instruction: z.string().nullish(),
  }),
})

// /points/{lat},{lon} 返回中只关心 forecast 地址
export const pointsResponseSchema = z.object({
  properties: z
    .object({
      forecast: z.string().nullish(),
    })
    .optional(),
})

// 预报返回，periods 的每一项单独校验
export const forecastResponseSchema = z.object({
  properties: z
    .object({
      periods: z.array(z.unknown()).optional(),
    })
    .optional(),
})

export const forecastPeriodSchema = z.object({
  name: z.string(),
  temperature: z.number(),
  temperatureUnit: z.string(),
  windSpeed: z.string(),
  windDirection: z.string(),
  detailedForecast: z.string(),
})

export type AlertFeature = z.infer<typeof alertFeatureSchema>
export type PointsResponse = z.infer<typeof pointsResponseSchema>
export type ForecastResponse = z.infer<typeof forecastResponseSchema>
export type ForecastPeriod = z.infer<typeof forecastPeriodSchema>
