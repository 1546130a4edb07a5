import { defineConfig } from "html-fragments";

export default defineConfig({
  selector: ".news-card__content",
  fields: {
    url: '<a href="([^"]*)"',
    title: "<h3[^>]*><a [^>]*>([\\s\\S]*?)</a>[\\s\\S]*?</h3>",
    desc: {
      pattern: "<p[^>]*>([\\s\\S]*?)</p>",
      stripHtml: true
    }
  },
  template: '<a href="https://news.example.com{#url#}">{#title#}</a> {#desc#}',
  reverse: true
});
