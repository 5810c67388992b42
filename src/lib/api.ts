/**
 * Route handler helpers: response envelope, error mapping and input parsing
 */
import { NextResponse } from 'next/server'
import type { z } from 'zod'
import { errorKindOf, publicErrorMessage, STATUS_BY_KIND, validationError } from '@/lib/errors'

export interface SuccessBody<T> {
  success: true
  data: T
  message?: string
}

export interface ErrorBody {
  success: false
  error: string
  code: string
}

export function ok<T>(data: T, message?: string, status = 200) {
  const body: SuccessBody<T> = message === undefined ? { success: true, data } : { success: true, data, message }
  return NextResponse.json(body, { status })
}

export function fail(error: string, code: string, status: number) {
  const body: ErrorBody = { success: false, error, code }
  return NextResponse.json(body, { status })
}

export function errorResponse(error: unknown, tag = 'API') {
  const kind = errorKindOf(error)
  const status = STATUS_BY_KIND[kind]

  if (status >= 500) {
    console.error(`[${tag}] ${kind}:`, error)
  }
  return fail(publicErrorMessage(error), kind, status)
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input)
  if (!parsed.success) {
    throw validationError(describeIssues(parsed.error))
  }
  return parsed.data
}

export async function parseJson<S extends z.ZodTypeAny>(request: Request, schema: S): Promise<z.output<S>> {
  let body: unknown
  try {
    body = await request.json()
  } catch {
    throw validationError('Request body must be valid JSON')
  }
  return parseWith(schema, body)
}

// Single-valued query parameters as a plain object
export function queryOf(request: Request): Record<string, string> {
  return Object.fromEntries(new URL(request.url).searchParams.entries())
}

export function parseQuery<S extends z.ZodTypeAny>(request: Request, schema: S): z.output<S> {
  return parseWith(schema, queryOf(request))
}

export function parseId(value: string, label = 'id'): number {
  const id = Number(value)
  if (!Number.isSafeInteger(id) || id < 1) {
    throw validationError(`${label} must be a positive integer`)
  }
  return id
}

// Like parseJson, but an empty body parses as `{}`
export async function parseOptionalJson<S extends z.ZodTypeAny>(request: Request, schema: S): Promise<z.output<S>> {
  const text = await request.text()
  if (!text.trim()) return parseWith(schema, {})
  let body: unknown
  try {
    body = JSON.parse(text)
  } catch {
    throw validationError('Request body must be valid JSON')
  }
  return parseWith(schema, body)
}

export interface MultipartForm {
  fields: Record<string, string>
  files(name: string): File[]
}

export async function readMultipart(request: Request): Promise<MultipartForm> {
  let formData: FormData
  try {
    formData = await request.formData()
  } catch {
    throw validationError('Request body must be multipart form data')
  }

  const fields: Record<string, string> = {}
  formData.forEach((value, key) => {
    if (typeof value === 'string') fields[key] = value
  })

  return {
    fields,
    files: name => formData.getAll(name).filter((value): value is File => value instanceof File),
  }
}

// Dynamic segments can arrive still percent-encoded
export function decodeParam(value: string): string {
  try {
    return decodeURIComponent(value)
  } catch {
    return value
  }
}
