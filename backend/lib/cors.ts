import { NextResponse } from "next/server";

// 카탈로그는 읽기 전용이라 GET 만 연다
export const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET,OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type",
};

export function corsJson<T>(data: T, init?: { status?: number }) {
  return NextResponse.json(data, {
    status: init?.status,
    headers: {
      ...CORS_HEADERS,
    },
  });
}

export function corsEmpty(status = 204) {
  return new NextResponse(null, {
    status,
    headers: {
      ...CORS_HEADERS,
    },
  });
}
