import { COLORS } from "../constants";
import { ColumnTemplate } from "../types";

/**
 * Serialize a value for embedding inside an inline <script>
 */
function toScriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, "\\u003c");
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * Generates the single-page dashboard: login screen, one upload tab per
 * report variant, and the table and chart containers filled in by the
 * page script from the /api/reports responses.
 * @param variants Report variants, in tab order
 * @returns HTML content as a string
 */
export function generateDashboardHtml(
  variants: Pick<ColumnTemplate, "id" | "label">[]
): string {
  const tabsHtml = variants
    .map(
      (variant, i) => `
          <li class="nav-item" role="presentation">
            <button class="nav-link ${i === 0 ? "active" : ""}" data-bs-toggle="tab"
              data-bs-target="#tab-${escapeHtml(variant.id)}" type="button" role="tab">
              ${escapeHtml(variant.label)}
            </button>
          </li>`
    )
    .join("");

  const panesHtml = variants
    .map(
      (variant, i) => `
          <div class="tab-pane fade ${i === 0 ? "show active" : ""}" id="tab-${escapeHtml(variant.id)}" role="tabpanel">
            <label class="upload-area d-block mt-4">
              <b>Drag and Drop or <a>Select a File</a></b>
              <input type="file" class="d-none" accept=".xlsx,.xlsm,.xlsb,.xls,.ods"
                data-variant="${escapeHtml(variant.id)}">
            </label>
            <div class="alert alert-danger d-none mt-3" data-error="${escapeHtml(variant.id)}"></div>
            <div class="m-4" data-table="${escapeHtml(variant.id)}"></div>
            <div class="chart-wide" id="bar-${escapeHtml(variant.id)}"></div>
            <div class="chart-narrow" id="pie-${escapeHtml(variant.id)}"></div>
          </div>`
    )
    .join("");

  return `
    <!DOCTYPE html>
    <html lang="en">
    <head>
      <meta charset="UTF-8">
      <meta name="viewport" content="width=device-width, initial-scale=1.0">
      <title>Weekly Stars Dashboard</title>
      <link href="https://cdn.jsdelivr.net/npm/bootstrap@5.3.0-alpha1/dist/css/bootstrap.min.css" rel="stylesheet">
      <script src="https://cdn.plot.ly/plotly-2.27.0.min.js"></script>
      <style>
        body { background-color: ${COLORS.background}; color: ${COLORS.text}; }
        .upload-area {
          width: 60%;
          height: 50px;
          line-height: 50px;
          border: 1px dashed ${COLORS.accent};
          border-radius: 5px;
          text-align: center;
          margin: auto;
          background-color: ${COLORS.button};
          cursor: pointer;
        }
        .report-table { font-size: 12px; width: 90%; margin: auto; }
        .report-table tbody tr:nth-child(odd) { background-color: rgb(248, 248, 248); }
        .chart-wide { width: 90%; margin: 20px auto 0; }
        .chart-narrow { width: 60%; margin: 20px auto 0; }
      </style>
    </head>
    <body>
      <div class="container mt-4 mb-5" id="login-screen">
        <h1 class="mt-5">Login to Weekly Stars Dashboard</h1>
        <div class="row mt-4">
          <form class="col-md-4" id="login-form">
            <label class="form-label" for="username-input">Username</label>
            <input class="form-control mb-2" id="username-input" type="text" placeholder="Enter username">
            <label class="form-label" for="password-input">Password</label>
            <input class="form-control mb-2" id="password-input" type="password" placeholder="Enter password">
            <button class="btn btn-primary mt-3" type="submit">Login</button>
          </form>
        </div>
        <button class="btn btn-success mt-2" id="forgot-password-button" type="button">Forgot Password</button>
        <div class="mt-3" id="login-output"></div>
      </div>

      <div class="container-fluid d-none" id="dashboard">
        <h1 class="text-center mt-4">Competitive Coding Development (CCD)</h1>
        <ul class="nav nav-tabs" role="tablist">${tabsHtml}
        </ul>
        <div class="tab-content">${panesHtml}
        </div>
      </div>

      <script src="https://cdn.jsdelivr.net/npm/bootstrap@5.3.0-alpha1/dist/js/bootstrap.bundle.min.js"></script>
      <script>
        const VARIANTS = ${toScriptJson(variants)};
        let authHeader = null;

        function showLoginMessage(html) {
          document.getElementById("login-output").innerHTML = html;
        }

        document.getElementById("login-form").addEventListener("submit", async (event) => {
          event.preventDefault();
          const username = document.getElementById("username-input").value;
          const password = document.getElementById("password-input").value;
          const response = await fetch("api/login", {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify({ username, password }),
          });
          if (response.ok) {
            authHeader = "Basic " + btoa(unescape(encodeURIComponent(username + ":" + password)));
            document.getElementById("login-screen").classList.add("d-none");
            document.getElementById("dashboard").classList.remove("d-none");
          } else {
            const body = await response.json();
            const alert = document.createElement("div");
            alert.className = "alert alert-danger alert-dismissible";
            alert.textContent = body.message;
            document.getElementById("login-output").replaceChildren(alert);
          }
        });

        document.getElementById("forgot-password-button").addEventListener("click", async () => {
          const body = await (await fetch("api/support")).json();
          const heading = document.createElement("h4");
          heading.style.color = "red";
          heading.textContent = "Contact Us";
          const text = document.createElement("p");
          text.textContent = body.message;
          document.getElementById("login-output").replaceChildren(heading, text);
        });

        function renderTable(container, table) {
          const element = document.createElement("table");
          element.className = "table table-sm report-table";
          const head = element.createTHead().insertRow();
          table.columns.forEach((column) => {
            const th = document.createElement("th");
            th.textContent = column;
            head.appendChild(th);
          });
          const body = element.createTBody();
          table.rows.forEach((row) => {
            const tr = body.insertRow();
            table.columns.forEach((column) => {
              const value = row[column];
              tr.insertCell().textContent = value === null ? "" : String(value);
            });
          });
          container.replaceChildren(element);
        }

        function readAsDataUrl(file) {
          return new Promise((resolve, reject) => {
            const reader = new FileReader();
            reader.onload = () => resolve(reader.result);
            reader.onerror = () => reject(reader.error);
            reader.readAsDataURL(file);
          });
        }

        VARIANTS.forEach((variant) => {
          const input = document.querySelector('input[data-variant="' + variant.id + '"]');
          const errorBox = document.querySelector('[data-error="' + variant.id + '"]');
          const tableBox = document.querySelector('[data-table="' + variant.id + '"]');
          const uploadArea = input.closest(".upload-area");

          async function upload(file) {
            if (!file) return;
            errorBox.classList.add("d-none");
            const contents = await readAsDataUrl(file);
            const response = await fetch("api/reports/" + encodeURIComponent(variant.id), {
              method: "POST",
              headers: { "Content-Type": "application/json", Authorization: authHeader },
              body: JSON.stringify({ contents }),
            });
            const body = await response.json();
            if (!response.ok) {
              errorBox.textContent = body.message;
              errorBox.classList.remove("d-none");
              return;
            }
            renderTable(tableBox, body.table);
            Plotly.newPlot("bar-" + variant.id, body.barFigure.data, body.barFigure.layout);
            Plotly.newPlot("pie-" + variant.id, body.pieFigure.data, body.pieFigure.layout);
          }

          input.addEventListener("change", async () => {
            await upload(input.files[0]);
            input.value = "";
          });
          uploadArea.addEventListener("dragover", (event) => {
            event.preventDefault();
          });
          uploadArea.addEventListener("drop", async (event) => {
            event.preventDefault();
            await upload(event.dataTransfer.files[0]);
          });
        });
      </script>
    </body>
    </html>
  `;
}
