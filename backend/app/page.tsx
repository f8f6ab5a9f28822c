export default function Home() {
  return (
    <main
      style={{
        display: "flex",
        minHeight: "100vh",
        alignItems: "center",
        justifyContent: "center",
      }}
    >
      <div style={{ textAlign: "center" }}>
        <h1>Movie Catalog</h1>
        <p>
          <a href="/movies">영화 목록 보기</a>
        </p>
      </div>
    </main>
  );
}
