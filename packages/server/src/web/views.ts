/**
 * HTML views
 *
 * The form posts url-encoded data without JavaScript; with JavaScript it
 * posts JSON and shows the result inline.
 */

import { html } from "hono/html";
import {
  MEASUREMENT_FIELDS,
  MEASUREMENT_KEYS,
  isMeasurementKey,
  type MeasurementField,
  type MeasurementKey,
} from "../submission/measurement.js";

export interface LastSubmission {
  date: string;
  weight: number;
  bodyFat: number;
}

export interface ResultDetails {
  success: boolean;
  message: string;
  values?: Record<string, number>;
  date?: string;
}

const styles = html`<style>
  body { font-family: system-ui, sans-serif; margin: 0 auto; max-width: 28rem; padding: 1rem; }
  h1 { font-size: 1.4rem; }
  label { display: block; margin-top: 0.75rem; font-weight: 600; }
  input { box-sizing: border-box; width: 100%; padding: 0.6rem; font-size: 1.1rem; }
  details { margin-top: 1rem; }
  button { margin-top: 1.25rem; width: 100%; padding: 0.8rem; font-size: 1.1rem; }
  .last { color: #555; }
  .result { margin-top: 1rem; padding: 0.75rem; border-radius: 4px; }
  .ok { background: #e6f4ea; }
  .fail { background: #fce8e6; }
</style>`;

function layout(title: string, body: unknown) {
  return html`<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${title}</title>
    ${styles}
  </head>
  <body>
    ${body}
  </body>
</html>`;
}

function fieldInput(key: MeasurementKey) {
  const field: MeasurementField = MEASUREMENT_FIELDS[key];
  const label = field.unit ? `${field.label} (${field.unit})` : field.label;

  return html`<label for="${key}">${label}</label>
    <input id="${key}" name="${key}" type="number" inputmode="decimal"
      min="${field.min}" max="${field.max}" step="${field.step}"${field.required ? html` required` : ""} />`;
}

const requiredKeys = MEASUREMENT_KEYS.filter((key) => MEASUREMENT_FIELDS[key].required);
const optionalKeys = MEASUREMENT_KEYS.filter((key) => !MEASUREMENT_FIELDS[key].required);

// Posts the form as JSON and renders the JSON response in place.
const script = html`<script>
  (function () {
    var form = document.getElementById("measurement-form");
    var result = document.getElementById("result");
    form.addEventListener("submit", function (event) {
      event.preventDefault();
      var payload = {};
      new FormData(form).forEach(function (value, key) {
        if (value !== "") payload[key] = value;
      });
      if (payload.timestamp) payload.timestamp = new Date(payload.timestamp).toISOString();
      result.className = "result";
      result.textContent = "Submitting...";
      fetch("/submit", {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify(payload)
      })
        .then(function (response) { return response.json(); })
        .then(function (body) {
          result.className = "result " + (body.success ? "ok" : "fail");
          result.textContent = body.success ? body.message : body.error;
          if (body.success) form.reset();
        })
        .catch(function () {
          result.className = "result fail";
          result.textContent = "Could not reach the server.";
        });
    });
  })();
</script>`;

export function renderFormPage(lastSubmission: LastSubmission | null) {
  return layout(
    "Body Composition",
    html`<h1>Body Composition</h1>
    ${lastSubmission
      ? html`<p class="last">Last submitted on ${lastSubmission.date}: ${lastSubmission.weight} kg, ${lastSubmission.bodyFat}% body fat</p>`
      : ""}
    <form id="measurement-form" method="post" action="/submit">
      ${requiredKeys.map(fieldInput)}
      <details>
        <summary>More measurements</summary>
        ${optionalKeys.map(fieldInput)}
        <label for="timestamp">Measured at</label>
        <input id="timestamp" name="timestamp" type="datetime-local" />
      </details>
      <button type="submit">Submit to Garmin Connect</button>
    </form>
    <div id="result" role="status"></div>
    ${script}`
  );
}

export function renderResultPage(details: ResultDetails) {
  const rows = Object.entries(details.values ?? {}).map(([key, value]) => {
    const label = isMeasurementKey(key) ? MEASUREMENT_FIELDS[key].label : key;
    return html`<li>${label}: ${value}</li>`;
  });

  return layout(
    details.success ? "Submitted" : "Submission failed",
    html`<h1>${details.success ? "Submitted" : "Submission failed"}</h1>
    <p class="result ${details.success ? "ok" : "fail"}">${details.message}</p>
    ${details.date ? html`<p>Date: ${details.date}</p>` : ""}
    ${rows.length > 0 ? html`<ul>${rows}</ul>` : ""}
    <p><a href="/">Back to the form</a></p>`
  );
}
