import { fromString } from "../utils/buffer.js";
import { type Catalog, defineCatalog, type FixtureEntry } from "./types.js";

function text(name: string, content: string): FixtureEntry {
  return { name, payload: fromString(content) };
}

export const RESPONSE_CATALOG: Catalog = defineCatalog([
  text(
    "01_simple_200.txt",
    "HTTP/1.1 200 OK\r\nContent-Length: 13\r\n\r\nHello, World!",
  ),
  text(
    "02_html_response.txt",
    "HTTP/1.1 200 OK\r\n" +
      "Content-Type: text/html; charset=utf-8\r\n" +
      "Content-Length: 95\r\n" +
      "Server: Apache/2.4.41\r\n" +
      "\r\n" +
      "<!DOCTYPE html>\n" +
      "<html>\n" +
      "<head><title>Welcome</title></head>\n" +
      "<body><h1>Hello!</h1></body>\n" +
      "</html>",
  ),
  text(
    "03_json_response.txt",
    "HTTP/1.1 200 OK\r\n" +
      "Content-Type: application/json\r\n" +
      "Content-Length: 89\r\n" +
      "X-Request-ID: req-12345\r\n" +
      "\r\n" +
      '{"status": "success", "data": {"id": 123, "name": "John Doe", "email": "john@example.com"}}',
  ),
  text(
    "04_201_created.txt",
    "HTTP/1.1 201 Created\r\n" +
      "Content-Type: application/json\r\n" +
      "Location: /api/users/456\r\n" +
      "Content-Length: 52\r\n" +
      "\r\n" +
      '{"id": 456, "message": "Resource created successfully"}',
  ),
  text(
    "05_204_no_content.txt",
    "HTTP/1.1 204 No Content\r\nX-Request-ID: abc-789\r\n\r\n",
  ),
  text(
    "06_301_redirect.txt",
    "HTTP/1.1 301 Moved Permanently\r\n" +
      "Location: https://www.example.com/new-page\r\n" +
      "Content-Type: text/html\r\n" +
      "Content-Length: 56\r\n" +
      "\r\n" +
      "<html><body>Moved to /new-page</body></html>",
  ),
  text(
    "07_302_redirect.txt",
    "HTTP/1.1 302 Found\r\n" +
      "Location: /login\r\n" +
      "Set-Cookie: session=expired; Max-Age=0\r\n" +
      "Content-Length: 0\r\n" +
      "\r\n",
  ),
  text(
    "08_304_not_modified.txt",
    "HTTP/1.1 304 Not Modified\r\n" +
      'ETag: "abc123def456"\r\n' +
      "Cache-Control: max-age=3600\r\n" +
      "\r\n",
  ),
  text(
    "09_400_bad_request.txt",
    "HTTP/1.1 400 Bad Request\r\n" +
      "Content-Type: application/json\r\n" +
      "Content-Length: 68\r\n" +
      "\r\n" +
      '{"error": "Bad Request", "message": "Missing required field: email"}',
  ),
  text(
    "10_401_unauthorized.txt",
    "HTTP/1.1 401 Unauthorized\r\n" +
      'WWW-Authenticate: Bearer realm="api"\r\n' +
      "Content-Type: application/json\r\n" +
      "Content-Length: 52\r\n" +
      "\r\n" +
      '{"error": "Unauthorized", "message": "Invalid token"}',
  ),
  text(
    "11_403_forbidden.txt",
    "HTTP/1.1 403 Forbidden\r\n" +
      "Content-Type: application/json\r\n" +
      "Content-Length: 65\r\n" +
      "\r\n" +
      '{"error": "Forbidden", "message": "Insufficient permissions"}',
  ),
  text(
    "12_404_not_found.txt",
    "HTTP/1.1 404 Not Found\r\n" +
      "Content-Type: text/html\r\n" +
      "Content-Length: 127\r\n" +
      "\r\n" +
      "<!DOCTYPE html>\n" +
      "<html>\n" +
      "<head><title>404 Not Found</title></head>\n" +
      "<body><h1>Not Found</h1><p>Resource not found.</p></body>\n" +
      "</html>",
  ),
  text(
    "13_500_server_error.txt",
    "HTTP/1.1 500 Internal Server Error\r\n" +
      "Content-Type: application/json\r\n" +
      "Content-Length: 74\r\n" +
      "Retry-After: 30\r\n" +
      "\r\n" +
      '{"error": "Internal Server Error", "message": "An unexpected error occurred"}',
  ),
  text(
    "14_503_unavailable.txt",
    "HTTP/1.1 503 Service Unavailable\r\n" +
      "Content-Type: application/json\r\n" +
      "Retry-After: 60\r\n" +
      "Content-Length: 62\r\n" +
      "\r\n" +
      '{"error": "Service Unavailable", "message": "Server overloaded"}',
  ),
  text(
    "15_large_response.txt",
    "HTTP/1.1 200 OK\r\n" +
      "Content-Type: text/plain\r\n" +
      "Content-Length: 1000\r\n" +
      "Cache-Control: public, max-age=86400\r\n" +
      "\r\n" +
      "X".repeat(1000),
  ),
  text(
    "16_many_headers.txt",
    "HTTP/1.1 200 OK\r\n" +
      "Content-Type: application/json\r\n" +
      "Content-Length: 27\r\n" +
      "Server: nginx/1.18.0\r\n" +
      "Date: Thu, 23 Jan 2026 12:00:00 GMT\r\n" +
      "Cache-Control: no-cache, no-store, must-revalidate\r\n" +
      "Pragma: no-cache\r\n" +
      "Expires: 0\r\n" +
      "X-Content-Type-Options: nosniff\r\n" +
      "X-Frame-Options: DENY\r\n" +
      "X-XSS-Protection: 1; mode=block\r\n" +
      "Strict-Transport-Security: max-age=31536000; includeSubDomains\r\n" +
      "Access-Control-Allow-Origin: *\r\n" +
      "X-Request-ID: req-abc-123-xyz\r\n" +
      "X-Response-Time: 42ms\r\n" +
      "\r\n" +
      '{"status": "ok", "data": []}',
  ),
]);
