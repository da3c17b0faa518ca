import { byteRange, concat, fromString } from "../utils/buffer.js";
import { type Catalog, defineCatalog, type FixtureEntry } from "./types.js";

function text(name: string, content: string): FixtureEntry {
  return { name, payload: fromString(content) };
}

function times(count: number, render: (i: number) => string): string[] {
  return Array.from({ length: count }, (_, i) => render(i));
}

const MULTIPART_BOUNDARY = "---------------------------9051914041544843365972754266";

export const REQUEST_CATALOG: Catalog = defineCatalog([
  text("01_simple_get.txt", "GET / HTTP/1.1\r\nHost: example.com\r\n\r\n"),
  text(
    "02_get_with_headers.txt",
    "GET /api/users HTTP/1.1\r\n" +
      "Host: api.example.com\r\n" +
      "Accept: application/json\r\n" +
      "Accept-Language: en-US,en;q=0.9\r\n" +
      "User-Agent: Mozilla/5.0 (Windows NT 10.0; Win64; x64)\r\n" +
      "Cache-Control: no-cache\r\n" +
      "\r\n",
  ),
  text(
    "03_post_small.txt",
    "POST /login HTTP/1.1\r\n" +
      "Host: example.com\r\n" +
      "Content-Type: application/x-www-form-urlencoded\r\n" +
      "Content-Length: 29\r\n" +
      "\r\n" +
      "username=admin&password=1234",
  ),
  text(
    "04_post_json.txt",
    "POST /api/data HTTP/1.1\r\n" +
      "Host: api.example.com\r\n" +
      "Content-Type: application/json\r\n" +
      "Accept: application/json\r\n" +
      "Content-Length: 52\r\n" +
      "\r\n" +
      '{"name": "John Doe", "email": "john@example.com"}',
  ),
  text(
    "05_put_request.txt",
    "PUT /api/users/123 HTTP/1.1\r\n" +
      "Host: api.example.com\r\n" +
      "Content-Type: application/json\r\n" +
      "Authorization: Bearer token123abc\r\n" +
      "Content-Length: 67\r\n" +
      "\r\n" +
      '{"id": 123, "name": "Jane Doe", "role": "admin", "active": true}',
  ),
  text(
    "06_delete_request.txt",
    "DELETE /api/users/456 HTTP/1.1\r\n" +
      "Host: api.example.com\r\n" +
      "Authorization: Bearer secrettoken\r\n" +
      "X-Request-ID: abc123\r\n" +
      "\r\n",
  ),
  text(
    "07_patch_request.txt",
    "PATCH /api/users/789 HTTP/1.1\r\n" +
      "Host: api.example.com\r\n" +
      "Content-Type: application/json-patch+json\r\n" +
      "Content-Length: 34\r\n" +
      "\r\n" +
      '[{"op": "replace", "path": "/name"}]',
  ),
  text(
    "08_head_request.txt",
    "HEAD /index.html HTTP/1.1\r\nHost: www.example.com\r\nAccept: text/html\r\n\r\n",
  ),
  text(
    "09_options_request.txt",
    "OPTIONS /api/users HTTP/1.1\r\n" +
      "Host: api.example.com\r\n" +
      "Origin: https://frontend.example.com\r\n" +
      "Access-Control-Request-Method: POST\r\n" +
      "Access-Control-Request-Headers: Content-Type, Authorization\r\n" +
      "\r\n",
  ),
  text(
    "10_get_query_params.txt",
    "GET /search?q=http+protocol&page=1&limit=20&sort=relevance HTTP/1.1\r\n" +
      "Host: search.example.com\r\n" +
      "Accept: application/json\r\n" +
      "X-API-Key: api_key_12345\r\n" +
      "\r\n",
  ),
  text(
    "11_post_large.txt",
    "POST /api/documents HTTP/1.1\r\n" +
      "Host: docs.example.com\r\n" +
      "Content-Type: text/plain\r\n" +
      "Content-Length: 1000\r\n" +
      "\r\n" +
      "A".repeat(1000),
  ),
  text(
    "12_get_with_cookies.txt",
    "GET /dashboard HTTP/1.1\r\n" +
      "Host: app.example.com\r\n" +
      "Cookie: session_id=abc123def456; user_pref=dark_mode; tracking_id=xyz789\r\n" +
      "Accept: text/html\r\n" +
      "\r\n",
  ),
  text(
    "13_post_multipart.txt",
    "POST /upload HTTP/1.1\r\n" +
      "Host: files.example.com\r\n" +
      "Content-Type: multipart/form-data; boundary=----WebKitFormBoundary7MA4YWxk\r\n" +
      "Content-Length: 200\r\n" +
      "\r\n" +
      "------WebKitFormBoundary7MA4YWxk\r\n" +
      'Content-Disposition: form-data; name="file"; filename="test.txt"\r\n' +
      "Content-Type: text/plain\r\n" +
      "\r\n" +
      "Hello World!\r\n" +
      "------WebKitFormBoundary7MA4YWxk--\r\n",
  ),
  text(
    "14_get_range.txt",
    "GET /video/large.mp4 HTTP/1.1\r\n" +
      "Host: cdn.example.com\r\n" +
      "Range: bytes=0-1023\r\n" +
      "Accept: video/mp4\r\n" +
      'If-Range: "etag123"\r\n' +
      "\r\n",
  ),
  text(
    "15_post_compressed.txt",
    "POST /api/batch HTTP/1.1\r\n" +
      "Host: api.example.com\r\n" +
      "Content-Type: application/json\r\n" +
      "Content-Encoding: gzip\r\n" +
      "Accept-Encoding: gzip, deflate, br\r\n" +
      "Content-Length: 85\r\n" +
      "\r\n" +
      '{"items": [{"id": 1}, {"id": 2}, {"id": 3}], "operation": "update", "async": true}',
  ),
  text(
    "16_connect_request.txt",
    "CONNECT www.example.com:443 HTTP/1.1\r\n" +
      "Host: www.example.com:443\r\n" +
      "Proxy-Authorization: Basic dXNlcjpwYXNz\r\n" +
      "Proxy-Connection: Keep-Alive\r\n" +
      "\r\n",
  ),
  text(
    "17_trace_request.txt",
    "TRACE /debug HTTP/1.1\r\nHost: example.com\r\nMax-Forwards: 5\r\n\r\n",
  ),
  text(
    "18_long_uri.txt",
    `GET /${"a".repeat(2000)}?param=value HTTP/1.1\r\nHost: example.com\r\n\r\n`,
  ),
  text(
    "19_many_query_params.txt",
    `GET /api/search?${times(50, (i) => `param${i}=value${i}`).join("&")} HTTP/1.1\r\n` +
      "Host: api.example.com\r\n" +
      "Accept: application/json\r\n" +
      "\r\n",
  ),
  text(
    "20_duplicate_headers.txt",
    "GET /resource HTTP/1.1\r\n" +
      "Host: example.com\r\n" +
      "Accept: text/html\r\n" +
      "Accept: application/xhtml+xml\r\n" +
      "Accept: application/xml;q=0.9\r\n" +
      "Cache-Control: no-cache\r\n" +
      "Cache-Control: no-store\r\n" +
      "\r\n",
  ),
  text(
    "21_long_header_value.txt",
    "GET /api/data HTTP/1.1\r\n" +
      "Host: example.com\r\n" +
      `X-Custom-Data: ${"x".repeat(4000)}\r\n` +
      "Accept: application/json\r\n" +
      "\r\n",
  ),
  text(
    "22_many_headers.txt",
    "GET /api/resource HTTP/1.1\r\n" +
      "Host: example.com\r\n" +
      times(50, (i) => `X-Custom-Header-${i}: value-${i}\r\n`).join("") +
      "\r\n",
  ),
  text(
    "23_chunked_request.txt",
    "POST /api/stream HTTP/1.1\r\n" +
      "Host: api.example.com\r\n" +
      "Content-Type: application/json\r\n" +
      "Transfer-Encoding: chunked\r\n" +
      "\r\n" +
      '7\r\n{"data":\r\n' +
      '8\r\n"hello"}\r\n' +
      "0\r\n\r\n",
  ),
  text(
    "24_very_large_body.txt",
    "POST /api/bulk HTTP/1.1\r\n" +
      "Host: api.example.com\r\n" +
      "Content-Type: application/octet-stream\r\n" +
      "Content-Length: 10000\r\n" +
      "\r\n" +
      "B".repeat(10000),
  ),
  text(
    "25_utf8_headers.txt",
    "GET /api/users HTTP/1.1\r\n" +
      "Host: example.com\r\n" +
      "X-User-Name: Jos√© Garc√≠a\r\n" +
      "X-City: Êù±‰∫¨\r\n" +
      "X-Emoji: \uf8ffüöÄ\uf8ffüî•\r\n" +
      "Accept: application/json\r\n" +
      "\r\n",
  ),
  text(
    "26_url_encoded.txt",
    "GET /search?q=%E4%B8%AD%E6%96%87&filter=%3Cscript%3E&path=%2Fetc%2Fpasswd HTTP/1.1\r\n" +
      "Host: example.com\r\n" +
      "Accept: text/html\r\n" +
      "\r\n",
  ),
  text(
    "27_empty_header_values.txt",
    "GET /resource HTTP/1.1\r\n" +
      "Host: example.com\r\n" +
      "X-Empty-Header: \r\n" +
      "X-Another-Empty: \r\n" +
      "Accept: */*\r\n" +
      "\r\n",
  ),
  text(
    "28_folded_headers.txt",
    "GET /legacy HTTP/1.1\r\n" +
      "Host: example.com\r\n" +
      "X-Long-Header: this is a very long header value\r\n" +
      " that continues on the next line\r\n" +
      " and even a third line\r\n" +
      "Accept: text/html\r\n" +
      "\r\n",
  ),
  // Raw bytes, not UTF-8: every value 1-255 except LF and CR, once each.
  {
    name: "29_binary_content.txt",
    payload: concat([
      fromString(
        "POST /upload/binary HTTP/1.1\r\n" +
          "Host: files.example.com\r\n" +
          "Content-Type: application/octet-stream\r\n" +
          "Content-Length: 256\r\n" +
          "\r\n",
      ),
      byteRange(0, 255, [0, 10, 13]),
    ]),
  },
  text(
    "30_absolute_uri.txt",
    "GET http://proxy.example.com/path/to/resource?query=value HTTP/1.1\r\n" +
      "Host: proxy.example.com\r\n" +
      "Proxy-Connection: keep-alive\r\n" +
      "\r\n",
  ),
  text(
    "31_expect_continue.txt",
    "POST /api/large-upload HTTP/1.1\r\n" +
      "Host: api.example.com\r\n" +
      "Content-Type: application/json\r\n" +
      "Content-Length: 1048576\r\n" +
      "Expect: 100-continue\r\n" +
      "\r\n",
  ),
  text(
    "32_complex_multipart.txt",
    "POST /api/upload-multiple HTTP/1.1\r\n" +
      "Host: files.example.com\r\n" +
      `Content-Type: multipart/form-data; boundary=${MULTIPART_BOUNDARY}\r\n` +
      "Content-Length: 554\r\n" +
      "\r\n" +
      `--${MULTIPART_BOUNDARY}\r\n` +
      'Content-Disposition: form-data; name="text_field"\r\n' +
      "\r\n" +
      "some text value\r\n" +
      `--${MULTIPART_BOUNDARY}\r\n` +
      'Content-Disposition: form-data; name="file1"; filename="document.txt"\r\n' +
      "Content-Type: text/plain\r\n" +
      "\r\n" +
      "This is file 1 content.\r\n" +
      `--${MULTIPART_BOUNDARY}\r\n` +
      'Content-Disposition: form-data; name="file2"; filename="image.png"\r\n' +
      "Content-Type: image/png\r\n" +
      "\r\n" +
      "PNG_BINARY_DATA_HERE\r\n" +
      `--${MULTIPART_BOUNDARY}--\r\n`,
  ),
]);
