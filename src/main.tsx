import React from "react";
import ReactDOM from "react-dom/client";
import "./index.css";
import NPuzzleLab from "./App";

const root = document.getElementById("root");
if (!root) throw new Error("Missing #root element");

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <NPuzzleLab />
  </React.StrictMode>
);
